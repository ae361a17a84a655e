import type { Rule } from "../types.js";
import { isBlank } from "../../utils/unicode.js";

export const blank: Rule = {
  id: "blank",
  name: "Blank translation",
  description: "Translation made only of whitespace while the source is not blank",
  defaultSeverity: "warning",
  defaultEnabled: true,
  groups: ["checks"],
  checkMsg(_entry, msgid, msgstr) {
    if (isBlank(msgid) || msgstr === "" || !isBlank(msgstr)) return [];
    return [{ message: "blank translation", source: [], translation: [[0, msgstr.length]] }];
  },
};
