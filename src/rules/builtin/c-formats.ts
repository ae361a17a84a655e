import type { Rule } from "../types.js";
import { cSortIndex, cStripIndex, formatTokens, type TextSpan } from "../../format/tokens.js";

function normalized(tokens: TextSpan[]): string[] {
  return [...tokens]
    .sort((a, b) => cSortIndex(a.text) - cSortIndex(b.text) || a.start - b.start)
    .map((token) => cStripIndex(token.text));
}

function sameList(a: string[], b: string[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

/**
 * Compares printf placeholders of `c-format` entries. Reordered arguments
 * (`%2$s %1$d`) are matched by position index.
 */
export const cFormats: Rule = {
  id: "c-formats",
  name: "C formats",
  description: "Inconsistent printf format strings between source and translation",
  defaultSeverity: "error",
  defaultEnabled: true,
  groups: ["checks"],
  checkMsg(entry, msgid, msgstr) {
    if (entry.format !== "c") return [];

    const idTokens = [...formatTokens(msgid, "c")];
    const strTokens = [...formatTokens(msgstr, "c")];
    if (sameList(normalized(idTokens), normalized(strTokens))) return [];

    return [
      {
        message: "inconsistent C format strings",
        source: idTokens.map((t) => [t.start, t.end] as const),
        translation: strTokens.map((t) => [t.start, t.end] as const),
      },
    ];
  },
};
