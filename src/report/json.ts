import type { Diagnostic, Severity } from "../diagnostics/types.js";
import type { FieldName } from "../po/entry.js";
import { toCodePointOffset } from "../utils/unicode.js";

export interface JsonContextLine {
  line: number;
  field: FieldName | null;
  text: string;
  /** `[start, end]` in code points of `text`. */
  highlights: Array<[number, number]>;
}

export interface JsonDiagnostic {
  path: string;
  rule: string;
  severity: Severity;
  message: string;
  line: number;
  location?: { line: number; column: number };
  lines: JsonContextLine[];
}

export function toJsonDiagnostic(diagnostic: Diagnostic): JsonDiagnostic {
  const lines = diagnostic.lines.map((line): JsonContextLine => {
    const highlights: Array<[number, number]> = [];
    if (line.field !== null) {
      for (const h of diagnostic.highlights) {
        if (h.field !== line.field) continue;
        highlights.push([toCodePointOffset(line.text, h.start), toCodePointOffset(line.text, h.end)]);
      }
    }
    return { line: line.line, field: line.field, text: line.text, highlights };
  });

  return {
    path: diagnostic.path,
    rule: diagnostic.ruleId,
    severity: diagnostic.severity,
    message: diagnostic.message,
    line: diagnostic.line,
    ...(diagnostic.location ? { location: diagnostic.location } : {}),
    lines,
  };
}

export function formatJson(diagnostics: readonly Diagnostic[]): string {
  return JSON.stringify(diagnostics.map(toJsonDiagnostic));
}
