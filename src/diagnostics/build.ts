import type { ContextLine, Diagnostic, Highlight, Severity } from "./types.js";

/** A diagnostic about the whole file, with no entry or highlights. */
export function fileDiagnostic(
  path: string,
  ruleId: string,
  severity: Severity,
  message: string,
  line = 0
): Diagnostic {
  return { path, ruleId, severity, message, line, highlights: [], lines: [] };
}

/**
 * Keep only highlights that fit in their line's text, dropping empty ones,
 * ordered by field appearance then offset.
 */
export function normalizeHighlights(highlights: Highlight[], lines: ContextLine[]): Highlight[] {
  const lengths = new Map<string, number>();
  const order = new Map<string, number>();
  for (const [i, line] of lines.entries()) {
    if (line.field === null || lengths.has(line.field)) continue;
    lengths.set(line.field, line.text.length);
    order.set(line.field, i);
  }

  return highlights
    .filter((h) => {
      const length = lengths.get(h.field);
      return length !== undefined && h.start >= 0 && h.start < h.end && h.end <= length;
    })
    .sort(
      (a, b) =>
        (order.get(a.field) ?? 0) - (order.get(b.field) ?? 0) ||
        a.start - b.start ||
        a.end - b.end
    );
}
