import type { FieldName } from "../po/entry.js";

export type Severity = "error" | "warning" | "info";

export const SEVERITIES: readonly Severity[] = ["error", "warning", "info"];

export interface Highlight {
  field: FieldName;
  /** UTF-16 offsets into the field's unescaped value, end exclusive. */
  start: number;
  end: number;
}

export interface ContextLine {
  /** 0 for the separator between source and translation. */
  line: number;
  field: FieldName | null;
  text: string;
}

export interface Diagnostic {
  path: string;
  ruleId: string;
  severity: Severity;
  message: string;
  line: number;
  /** File position of the first highlight, when there is one. */
  location?: { line: number; column: number };
  highlights: Highlight[];
  lines: ContextLine[];
}

/** Diagnostics raised outside the rule registry. */
export const SYSTEM_RULES = {
  syntaxError: "syntax-error",
  ruleError: "rule-error",
  readError: "read-error",
  encodingError: "encoding-error",
  parseError: "parse-error",
} as const;
