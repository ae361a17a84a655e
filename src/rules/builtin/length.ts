import type { Rule } from "../types.js";
import { codePointLength, trimUnicode } from "../../utils/unicode.js";

const RATIO = 10;

function lengths(msgid: string, msgstr: string): [number, number] {
  return [codePointLength(trimUnicode(msgid)), codePointLength(trimUnicode(msgstr))];
}

export const long: Rule = {
  id: "long",
  name: "Long translation",
  description: "Translation at least ten times longer than the source",
  defaultSeverity: "warning",
  defaultEnabled: false,
  groups: ["checks"],
  checkMsg(_entry, msgid, msgstr) {
    const [id, str] = lengths(msgid, msgstr);
    if (id === 0 || str === 0) return [];
    if (id * RATIO > str && !(id === 1 && str > 1)) return [];
    return [
      {
        message: `translation too long (${id} / ${str})`,
        source: [],
        translation: [[0, msgstr.length]],
      },
    ];
  },
};

export const short: Rule = {
  id: "short",
  name: "Short translation",
  description: "Translation at least ten times shorter than the source",
  defaultSeverity: "warning",
  defaultEnabled: false,
  groups: ["checks"],
  checkMsg(_entry, msgid, msgstr) {
    const [id, str] = lengths(msgid, msgstr);
    if (id === 0 || str === 0) return [];
    if (str * RATIO > id && !(str === 1 && id > 1)) return [];
    return [
      {
        message: `translation too short (${id} / ${str})`,
        source: [[0, msgid.length]],
        translation: [],
      },
    ];
  },
};
