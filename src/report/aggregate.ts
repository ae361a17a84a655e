import type { Diagnostic, Severity } from "../diagnostics/types.js";
import { SEVERITIES } from "../diagnostics/types.js";
import type { FileResult } from "../pipeline/scan.js";
import type { FileStatistics, Statistics } from "../stats/statistics.js";
import { totalStatistics } from "../stats/statistics.js";
import { compareCodeUnits } from "../utils/unicode.js";
import { sortFileDiagnostics } from "./sort.js";

export interface RuleCount {
  ruleId: string;
  count: number;
}

export interface ReportSummary {
  filesChecked: number;
  filesWithProblems: number;
  errors: number;
  warnings: number;
  info: number;
  total: number;
  /** Most frequent first, then by rule id. */
  byRule: RuleCount[];
  elapsedMs: number;
}

export interface FileReport {
  path: string;
  diagnostics: Diagnostic[];
  counts: Record<Severity, number>;
}

export interface Report {
  files: FileReport[];
  summary: ReportSummary;
  /** Files whose statistics could be computed, in path order. */
  statistics: FileStatistics[];
  /** Sum over `statistics`; null unless there are several files. */
  totalStatistics: Statistics | null;
}

const SEVERITY_KEYS: Record<Severity, "errors" | "warnings" | "info"> = {
  error: "errors",
  warning: "warnings",
  info: "info",
};

function countSeverities(diagnostics: readonly Diagnostic[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { error: 0, warning: 0, info: 0 };
  for (const diagnostic of diagnostics) counts[diagnostic.severity]++;
  return counts;
}

export function aggregate(results: readonly FileResult[], elapsedMs: number): Report {
  const sorted = [...results].sort((a, b) => compareCodeUnits(a.path, b.path));
  const summary: ReportSummary = {
    filesChecked: sorted.length,
    filesWithProblems: 0,
    errors: 0,
    warnings: 0,
    info: 0,
    total: 0,
    byRule: [],
    elapsedMs,
  };
  const perRule = new Map<string, number>();
  const files: FileReport[] = [];
  const statistics: FileStatistics[] = [];

  for (const result of sorted) {
    const diagnostics = sortFileDiagnostics(result.diagnostics);
    const counts = countSeverities(diagnostics);
    files.push({ path: result.path, diagnostics, counts });

    if (diagnostics.length > 0) summary.filesWithProblems++;
    for (const severity of SEVERITIES) {
      summary[SEVERITY_KEYS[severity]] += counts[severity];
    }
    summary.total += diagnostics.length;
    for (const { ruleId } of diagnostics) {
      perRule.set(ruleId, (perRule.get(ruleId) ?? 0) + 1);
    }

    if (result.statistics) statistics.push({ path: result.path, statistics: result.statistics });
  }

  summary.byRule = [...perRule]
    .map(([ruleId, count]) => ({ ruleId, count }))
    .sort((a, b) => b.count - a.count || compareCodeUnits(a.ruleId, b.ruleId));

  return {
    files,
    summary,
    statistics,
    totalStatistics: statistics.length > 1 ? totalStatistics(statistics) : null,
  };
}

/** 0 when no file has a problem, 1 otherwise. */
export function exitCode(report: Report): 0 | 1 {
  return report.summary.filesWithProblems === 0 ? 0 : 1;
}

export function allDiagnostics(report: Report): Diagnostic[] {
  return report.files.flatMap((file) => file.diagnostics);
}
