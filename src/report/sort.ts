import type { Diagnostic } from "../diagnostics/types.js";
import { compareCodeUnits } from "../utils/unicode.js";

export type DiagnosticSort = "line" | "message" | "rule";

type Compare = (a: Diagnostic, b: Diagnostic) => number;

const byPath: Compare = (a, b) => compareCodeUnits(a.path, b.path);
const byLine: Compare = (a, b) => a.line - b.line;
const byRule: Compare = (a, b) => compareCodeUnits(a.ruleId, b.ruleId);
const byMessage: Compare = (a, b) => compareCodeUnits(a.message, b.message);

const chain =
  (...compares: Compare[]): Compare =>
  (a, b) => {
    for (const compare of compares) {
      const result = compare(a, b);
      if (result !== 0) return result;
    }
    return 0;
  };

const ORDERS: Record<DiagnosticSort, Compare> = {
  line: chain(byPath, byLine, byRule),
  message: chain(byMessage, byPath, byLine),
  rule: chain(byRule, byPath, byLine),
};

/** Diagnostics of one file, by line then rule id. Ties keep their order. */
export function sortFileDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  return [...diagnostics].sort(chain(byLine, byRule));
}

/** A sorted copy; `Array.prototype.sort` is stable, so ties keep their order. */
export function sortDiagnostics(
  diagnostics: readonly Diagnostic[],
  order: DiagnosticSort = "line"
): Diagnostic[] {
  return [...diagnostics].sort(ORDERS[order]);
}
