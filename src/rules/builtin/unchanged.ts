import type { Rule } from "../types.js";
import { isAlphabetic, isBlank, isUppercase } from "../../utils/unicode.js";

function allUppercase(s: string): boolean {
  for (const ch of s) {
    if (isAlphabetic(ch) && !isUppercase(ch)) return false;
  }
  return true;
}

export const unchanged: Rule = {
  id: "unchanged",
  name: "Unchanged",
  description: "Translation identical to the source",
  defaultSeverity: "info",
  defaultEnabled: false,
  groups: ["status"],
  checkMsg(_entry, msgid, msgstr) {
    if (isBlank(msgid) || isBlank(msgstr) || msgid !== msgstr) return [];
    if (allUppercase(msgid)) return [];
    return [{ message: "unchanged translation", source: [], translation: [] }];
  },
};
