import type { MsgFinding, Span } from "../types.js";
import { matchIndices } from "../../utils/unicode.js";

/** Spans of every occurrence of `needle`, or of any of `needles`. */
export function occurrences(s: string, needles: string | readonly string[]): Span[] {
  if (typeof needles === "string") return matchIndices(s, needles);
  return needles
    .flatMap((needle) => matchIndices(s, needle))
    .sort((a, b) => a[0] - b[0]);
}

/**
 * `missing <what> (a / b)` when the translation has fewer occurrences than
 * the source, `extra <what> (a / b)` when it has more.
 */
export function compareCounts(what: string, source: Span[], translation: Span[]): MsgFinding[] {
  const a = source.length;
  const b = translation.length;
  if (a === b) return [];
  const kind = a > b ? "missing" : "extra";
  return [{ message: `${kind} ${what} (${a} / ${b})`, source, translation }];
}
