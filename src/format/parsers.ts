import type { FormatLanguage } from "../po/entry.js";

/**
 * Recognizes the format placeholders of one language (printf `%d`,
 * Python `{name}`...).
 */
export interface FormatParser {
  /**
   * Look at `s[pos]`. Returns the position after an introducer character and
   * whether a placeholder starts there; returns `pos` unchanged when the
   * character is plain text. A doubled introducer (`%%`, `{{`) is plain text.
   */
  nextChar(s: string, pos: number): [number, boolean];
  /** End of the placeholder whose body starts at `pos`. */
  findEndFormat(s: string, pos: number): number;
}

const isDigit = (code: number) => code >= 0x30 && code <= 0x39;
const isAsciiAlpha = (code: number) =>
  (code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a);

function introducer(char: string) {
  return (s: string, pos: number): [number, boolean] => {
    if (pos + 1 >= s.length || s[pos] !== char) return [pos, false];
    return [pos + 1, s[pos + 1] !== char];
  };
}

export const nullFormat: FormatParser = {
  nextChar: (_s, pos) => [pos, false],
  findEndFormat: (s) => s.length,
};

export const cFormat: FormatParser = {
  nextChar: introducer("%"),
  findEndFormat(s, pos) {
    let end = pos;
    // flags, width, precision, `n$` reordering
    while (end < s.length && (isDigit(s.charCodeAt(end)) || "-+ #.$".includes(s[end]))) {
      end++;
    }
    // length modifiers
    if (end < s.length) {
      const ch = s[end];
      if (ch === "h" || ch === "l") {
        end++;
        if (end < s.length && s[end] === ch) end++;
      } else if ("qLjzZt".includes(ch)) {
        end++;
      }
    }
    if (end < s.length && isAsciiAlpha(s.charCodeAt(end))) end++;
    return end;
  },
};

export const pythonFormat: FormatParser = {
  nextChar: introducer("%"),
  findEndFormat(s, pos) {
    let end = pos;
    if (end < s.length && s[end] === "(") {
      const close = s.indexOf(")", end);
      if (close < 0) return s.length;
      end = close + 1;
    }
    while (end < s.length && (isDigit(s.charCodeAt(end)) || "-+ #.".includes(s[end]))) {
      end++;
    }
    if (end < s.length && "hlL".includes(s[end])) end++;
    if (end < s.length && isAsciiAlpha(s.charCodeAt(end))) end++;
    return end;
  },
};

export const pythonBraceFormat: FormatParser = {
  nextChar: introducer("{"),
  findEndFormat(s, pos) {
    let end = pos;
    let level = 1;
    while (end < s.length) {
      if (s[end] === "{") {
        level++;
      } else if (s[end] === "}") {
        level--;
        if (level <= 0) return end + 1;
      }
      end++;
    }
    return end;
  },
};

export function formatParser(language: FormatLanguage | null): FormatParser {
  switch (language) {
    case "c":
      return cFormat;
    case "python":
      return pythonFormat;
    case "python-brace":
      return pythonBraceFormat;
    default:
      return nullFormat;
  }
}
