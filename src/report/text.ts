import type { ContextLine, Diagnostic, Highlight } from "../diagnostics/types.js";
import { escapeChar } from "../po/escape.js";
import { codePointLength } from "../utils/unicode.js";
import {
  entryPercentages,
  percent,
  STATUSES,
  type EntryStatus,
  type FileStatistics,
  type Statistics,
  type TextCounts,
} from "../stats/statistics.js";
import type { FileReport, Report, ReportSummary } from "./aggregate.js";

const GUTTER = "        |";

/** Escape a field value for display, with the column each value offset lands on. */
export function escapeForDisplay(value: string): { text: string; columns: number[] } {
  const columns: number[] = [];
  let text = "";
  let column = 0;
  for (let i = 0; i < value.length; ) {
    const ch = String.fromCodePoint(value.codePointAt(i) ?? 0);
    for (let k = 0; k < ch.length; k++) columns[i + k] = column;
    const shown = escapeChar(ch);
    text += shown;
    column += codePointLength(shown);
    i += ch.length;
  }
  columns[value.length] = column;
  return { text, columns };
}

/** Carets under the highlighted columns, trailing spaces removed. */
export function underline(columns: readonly number[], highlights: readonly Highlight[]): string {
  const width = columns[columns.length - 1] ?? 0;
  const marks = new Array<string>(width).fill(" ");
  for (const { start, end } of highlights) {
    const from = columns[start] ?? width;
    const to = columns[end] ?? width;
    for (let c = from; c < to; c++) marks[c] = "^";
  }
  return marks.join("").trimEnd();
}

function gutter(line: number): string {
  return line > 0 ? `${String(line).padStart(7)} | ` : `${GUTTER} `;
}

function formatContextLine(line: ContextLine, highlights: readonly Highlight[]): string[] {
  if (line.field === null) {
    return [line.text === "" ? GUTTER : `${gutter(line.line)}${line.text}`];
  }

  const { text, columns } = escapeForDisplay(line.text);
  const lead = `${line.field} "`;
  const out = [`${gutter(line.line)}${lead}${text}"`];
  const own = highlights.filter((h) => h.field === line.field);
  if (own.length > 0) {
    const marks = underline(columns, own);
    if (marks !== "") out.push(`${GUTTER} ${" ".repeat(lead.length)}${marks}`);
  }
  return out;
}

/**
 * ```
 * po/fr.po:12: [error:brackets] missing closing square brackets ']' (1 / 0)
 *         |
 *      12 | msgid "Hello [world]"
 *         |                    ^
 * ```
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const where = diagnostic.line > 0 ? `:${diagnostic.line}` : "";
  const head = `${diagnostic.path}${where}: [${diagnostic.severity}:${diagnostic.ruleId}] ${diagnostic.message}`;
  if (diagnostic.lines.length === 0) return head;

  const body = diagnostic.lines.flatMap((line) =>
    formatContextLine(line, line.field === null ? [] : diagnostic.highlights)
  );
  return [head, GUTTER, ...body, GUTTER].join("\n");
}

export function formatSummary(summary: ReportSummary): string {
  const elapsed = `[${summary.elapsedMs}ms]`;
  if (summary.filesChecked === 0) return `No files checked ${elapsed}`;
  if (summary.filesWithProblems === 0) {
    return `${summary.filesChecked} files checked: all OK! ${elapsed}`;
  }
  return (
    `${summary.filesChecked} files checked: ${summary.total} problems ` +
    `in ${summary.filesWithProblems} files ` +
    `(${summary.errors} errors, ${summary.warnings} warnings, ${summary.info} info) ${elapsed}`
  );
}

export function formatRuleCounts(summary: ReportSummary): string {
  return ["Problems by rule:", ...summary.byRule.map((r) => `  ${r.ruleId}: ${r.count}`)].join("\n");
}

export function formatFileCounts(files: readonly FileReport[]): string {
  return files
    .map(({ path, counts }) => {
      const total = counts.error + counts.warning + counts.info;
      if (total === 0) return `${path}: all OK!`;
      return `${path}: ${total} problems (${counts.error} errors, ${counts.warning} warnings, ${counts.info} info)`;
    })
    .join("\n");
}

/** Diagnostics, blank line separated, then the summary line. */
export function formatReport(
  report: Report,
  diagnostics: readonly Diagnostic[],
  options: { ruleCounts?: boolean; fileCounts?: boolean } = {}
): string {
  const blocks = diagnostics.map(formatDiagnostic);
  if (options.ruleCounts && report.summary.byRule.length > 0) {
    blocks.push(formatRuleCounts(report.summary));
  }
  if (options.fileCounts && report.files.length > 0) {
    blocks.push(formatFileCounts(report.files));
  }
  blocks.push(formatSummary(report.summary));
  return blocks.join("\n\n");
}

const STATUS_LABELS: Record<EntryStatus, string> = {
  translated: "Translated",
  fuzzy: "Fuzzy",
  untranslated: "Untranslated",
  obsolete: "Obsolete",
};

/** `path  total = translated (pct%) + fuzzy (pct%) + untranslated (pct%) + obsolete (pct%)` */
export function formatEntryLine(path: string, statistics: Statistics, width = path.length): string {
  const { entries } = statistics;
  const pct = entryPercentages(entries);
  const parts = STATUSES.map((status) => `${entries[status]} (${pct[status]}%)`);
  return `${path.padEnd(width)} ${entries.total} = ${parts.join(" + ")}`;
}

function countCells(counts: TextCounts, status: EntryStatus): string {
  const source = counts.source[status];
  return [
    String(source).padStart(10),
    `(${String(percent(source, counts.sourceTotal)).padStart(3)}%)`,
    String(counts.translation[status]).padStart(10),
  ].join(" ");
}

/** One row per status with entry, word and character counts. */
export function formatWordTable(statistics: Statistics): string {
  const { entries } = statistics;
  const pct = entryPercentages(entries);
  const header = `${"".padEnd(14)} ${"Entries".padStart(17)} ${"Words".padStart(28)} ${"Chars".padStart(28)}`;
  const rows = STATUSES.map((status) =>
    [
      STATUS_LABELS[status].padEnd(14),
      String(entries[status]).padStart(10),
      `(${String(pct[status]).padStart(3)}%)`,
      countCells(statistics.words, status),
      countCells(statistics.chars, status),
    ].join(" ")
  );
  const total = [
    "Total".padEnd(14),
    String(entries.total).padStart(10),
    "".padStart(6),
    String(statistics.words.sourceTotal).padStart(10),
    "".padStart(17),
    String(statistics.chars.sourceTotal).padStart(10),
  ].join(" ");
  return [header, ...rows, total].join("\n");
}

/**
 * Statistics lines per file, plus a `Total (n)` line when there are several.
 * With `words`, each file gets a table instead of a single line.
 */
export function formatStatistics(
  items: readonly FileStatistics[],
  total: Statistics | null,
  options: { words?: boolean } = {}
): string {
  const rows: FileStatistics[] = [...items];
  if (total) rows.push({ path: `Total (${items.length})`, statistics: total });

  if (options.words) {
    return rows.map((row) => `${row.path}:\n${formatWordTable(row.statistics)}`).join("\n\n");
  }
  const width = Math.max(0, ...rows.map((row) => row.path.length));
  return rows.map((row) => formatEntryLine(row.path, row.statistics, width)).join("\n");
}
