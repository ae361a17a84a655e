import type { FormatLanguage } from "../po/entry.js";
import { isAlphanumeric } from "../utils/unicode.js";
import { formatParser } from "./parsers.js";

export interface TextSpan {
  text: string;
  start: number;
  end: number;
}

function charAt(s: string, pos: number): string {
  const code = s.codePointAt(pos);
  return code === undefined ? "" : String.fromCodePoint(code);
}

/** Placeholders of `language` in `s`, in order of appearance. */
export function* formatTokens(s: string, language: FormatLanguage | null): Generator<TextSpan> {
  const parser = formatParser(language);
  let pos = 0;
  while (pos < s.length) {
    const start = pos;
    const [next, isFormat] = parser.nextChar(s, pos);
    pos = next;
    if (pos >= s.length) return;
    if (isFormat) {
      pos = parser.findEndFormat(s, pos);
      yield { text: s.slice(start, pos), start, end: pos };
      continue;
    }
    pos += charAt(s, pos).length;
  }
}

/**
 * Words of `s`: runs of letters and digits, hyphens included after the first
 * character, skipping placeholders.
 */
export function* wordTokens(s: string, language: FormatLanguage | null): Generator<TextSpan> {
  const parser = formatParser(language);
  let pos = 0;
  while (pos < s.length) {
    let start = -1;
    let end = -1;
    while (pos < s.length) {
      if (start < 0) {
        const [next, isFormat] = parser.nextChar(s, pos);
        pos = next;
        if (pos >= s.length) break;
        if (isFormat) {
          pos = parser.findEndFormat(s, pos);
          continue;
        }
      }
      const ch = charAt(s, pos);
      if (isAlphanumeric(ch) || (start >= 0 && ch === "-")) {
        if (start < 0) start = pos;
        end = pos + ch.length;
      } else if (start >= 0) {
        break;
      }
      pos += ch.length;
    }
    if (start < 0) return;
    yield { text: s.slice(start, end), start, end };
  }
}

/** Letters, digits and hyphens of `s`, one span each, skipping placeholders. */
export function* charTokens(s: string, language: FormatLanguage | null): Generator<TextSpan> {
  const parser = formatParser(language);
  let pos = 0;
  while (pos < s.length) {
    const [next, isFormat] = parser.nextChar(s, pos);
    pos = next;
    if (pos >= s.length) return;
    if (isFormat) {
      pos = parser.findEndFormat(s, pos);
      continue;
    }
    const ch = charAt(s, pos);
    if (isAlphanumeric(ch) || ch === "-") {
      yield { text: ch, start: pos, end: pos + ch.length };
    }
    pos += ch.length;
  }
}

export function countWords(s: string, language: FormatLanguage | null): number {
  let count = 0;
  for (const _ of wordTokens(s, language)) count++;
  return count;
}

export function countChars(s: string, language: FormatLanguage | null): number {
  let count = 0;
  for (const _ of charTokens(s, language)) count++;
  return count;
}

const POSITIONAL = /^%(\d+)\$/;

/** The `n` of a `%n$d` placeholder, or Infinity when it has none. */
export function cSortIndex(token: string): number {
  const match = POSITIONAL.exec(token);
  return match ? parseInt(match[1], 10) : Number.POSITIVE_INFINITY;
}

/** `%2$d` becomes `%d`; other tokens are returned as is. */
export function cStripIndex(token: string): string {
  const match = POSITIONAL.exec(token);
  return match ? `%${token.slice(match[0].length)}` : token;
}
