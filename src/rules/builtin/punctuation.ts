import type { Rule } from "../types.js";
import { isWhitespace, trimUnicode } from "../../utils/unicode.js";

/** Sentence punctuation, with full-width and Arabic variants. */
const PUNCTUATION = new Set([
  ":", "：", ";", "；", "؛",
  ".", "。", "…",
  ",", "，", "،",
  "!", "！",
  "?", "？", "؟",
]);

const NORMALIZED: Record<string, string> = {
  "：": ":",
  "；": ";",
  "؛": ";",
  "。": ".",
  "，": ",",
  "،": ",",
  "！": "!",
  "？": "?",
  "؟": "?",
};

/**
 * Length of the punctuation run at one end of `chars`, whitespace (but not
 * line feeds) included until the first punctuation mark.
 */
function punctuationRun(chars: string[]): number {
  let length = 0;
  let seenPunctuation = false;
  for (const ch of chars) {
    if (PUNCTUATION.has(ch)) {
      seenPunctuation = true;
    } else if (!(isWhitespace(ch) && ch !== "\n" && !seenPunctuation)) {
      break;
    }
    length += ch.length;
  }
  return length;
}

export function leadingPunctuation(s: string): string {
  return s.slice(0, punctuationRun([...s]));
}

export function trailingPunctuation(s: string): string {
  return s.slice(s.length - punctuationRun([...s].reverse()));
}

/** Map locale variants to one family: `？` and `؟` are `?`, `...` is `…`. */
export function normalizePunctuation(s: string, languageCode: string): string {
  let out = "";
  for (const ch of trimUnicode(s)) {
    if (ch === "?" && languageCode === "el") {
      // Greek question mark
      out += ";";
    } else {
      out += NORMALIZED[ch] ?? ch;
    }
  }
  return out.replaceAll("...", "…");
}

export const puncStart: Rule = {
  id: "punc-start",
  name: "Leading punctuation",
  description: "Different punctuation at the start of source and translation",
  defaultSeverity: "info",
  defaultEnabled: true,
  groups: ["checks"],
  checkMsg(_entry, msgid, msgstr, { catalog }) {
    const idPunc = leadingPunctuation(msgid);
    const strPunc = leadingPunctuation(msgstr);
    const language = catalog.header.languageCode;
    const a = normalizePunctuation(idPunc, language);
    const b = normalizePunctuation(strPunc, language);
    // Leading dots (".po file") are not compared.
    if (a.startsWith(".") || b.startsWith(".") || a === b) return [];
    return [
      {
        message: `inconsistent leading punctuation ('${a}' / '${b}')`,
        source: [[0, idPunc.length]],
        translation: [[0, strPunc.length]],
      },
    ];
  },
};

export const puncEnd: Rule = {
  id: "punc-end",
  name: "Trailing punctuation",
  description: "Different punctuation at the end of source and translation",
  defaultSeverity: "info",
  defaultEnabled: true,
  groups: ["checks"],
  checkMsg(_entry, msgid, msgstr, { catalog }) {
    const idPunc = trailingPunctuation(msgid);
    const strPunc = trailingPunctuation(msgstr);
    const language = catalog.header.languageCode;
    const a = normalizePunctuation(idPunc, language);
    const b = normalizePunctuation(strPunc, language);
    if (a === b) return [];
    return [
      {
        message: `inconsistent trailing punctuation ('${a}' / '${b}')`,
        source: [[msgid.length - idPunc.length, msgid.length]],
        translation: [[msgstr.length - strPunc.length, msgstr.length]],
      },
    ];
  },
};
