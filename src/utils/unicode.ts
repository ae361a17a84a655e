const WHITESPACE = /^\p{White_Space}$/u;
const ALPHABETIC = /^\p{Alphabetic}$/u;
const ALPHANUMERIC = /^[\p{Alphabetic}\p{Nd}\p{Nl}\p{No}]$/u;
const UPPERCASE = /^\p{Uppercase}$/u;
const LEADING_WS = /^\p{White_Space}+/u;
const TRAILING_WS = /\p{White_Space}+$/u;

export function isWhitespace(ch: string): boolean {
  return WHITESPACE.test(ch);
}

export function isAlphabetic(ch: string): boolean {
  return ALPHABETIC.test(ch);
}

export function isAlphanumeric(ch: string): boolean {
  return ALPHANUMERIC.test(ch);
}

export function isUppercase(ch: string): boolean {
  return UPPERCASE.test(ch);
}

/** Trim Unicode `White_Space` characters on both ends. */
export function trimUnicode(s: string): string {
  return s.replace(LEADING_WS, "").replace(TRAILING_WS, "");
}

export function isBlank(s: string): boolean {
  return trimUnicode(s).length === 0;
}

/** Count of code points in `s`. */
export function codePointLength(s: string): number {
  let count = 0;
  for (const _ of s) count++;
  return count;
}

/** Convert a UTF-16 index into a code point index. */
export function toCodePointOffset(s: string, index: number): number {
  return codePointLength(s.slice(0, index));
}

/** Start offsets of every occurrence of `needle` (non-overlapping, left to right). */
export function matchIndices(haystack: string, needle: string): Array<[number, number]> {
  const result: Array<[number, number]> = [];
  if (needle.length === 0) return result;
  let idx = haystack.indexOf(needle);
  while (idx !== -1) {
    result.push([idx, idx + needle.length]);
    idx = haystack.indexOf(needle, idx + needle.length);
  }
  return result;
}

/** Plain UTF-16 code unit order, independent of the locale. */
export function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
