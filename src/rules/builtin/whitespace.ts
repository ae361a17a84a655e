import type { Rule } from "../types.js";
import { isBlank, isWhitespace } from "../../utils/unicode.js";

function whitespaceRun(chars: string[]): number {
  let length = 0;
  for (const ch of chars) {
    if (!isWhitespace(ch) || ch === "\n") break;
    length += ch.length;
  }
  return length;
}

export const whitespaceStart: Rule = {
  id: "whitespace-start",
  name: "Leading whitespace",
  description: "Different whitespace at the start of source and translation",
  defaultSeverity: "info",
  defaultEnabled: true,
  groups: ["checks"],
  checkMsg(_entry, msgid, msgstr) {
    if (isBlank(msgid) || isBlank(msgstr)) return [];
    const idWs = msgid.slice(0, whitespaceRun([...msgid]));
    const strWs = msgstr.slice(0, whitespaceRun([...msgstr]));
    if (idWs === strWs) return [];
    return [
      {
        message: `inconsistent leading whitespace ('${idWs}' / '${strWs}')`,
        source: [[0, idWs.length]],
        translation: [[0, strWs.length]],
      },
    ];
  },
};

export const whitespaceEnd: Rule = {
  id: "whitespace-end",
  name: "Trailing whitespace",
  description: "Different whitespace at the end of source and translation",
  defaultSeverity: "info",
  defaultEnabled: true,
  groups: ["checks"],
  checkMsg(_entry, msgid, msgstr) {
    if (isBlank(msgid) || isBlank(msgstr)) return [];
    const idWs = msgid.slice(msgid.length - whitespaceRun([...msgid].reverse()));
    const strWs = msgstr.slice(msgstr.length - whitespaceRun([...msgstr].reverse()));
    if (idWs === strWs) return [];
    return [
      {
        message: `inconsistent trailing whitespace ('${idWs}' / '${strWs}')`,
        source: [[msgid.length - idWs.length, msgid.length]],
        translation: [[msgstr.length - strWs.length, msgstr.length]],
      },
    ];
  },
};
