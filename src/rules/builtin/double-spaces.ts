import type { Rule } from "../types.js";
import { compareCounts, occurrences } from "./compare.js";

export const doubleSpaces: Rule = {
  id: "double-spaces",
  name: "Double spaces",
  description: "Different number of double spaces",
  defaultSeverity: "info",
  defaultEnabled: true,
  groups: ["checks"],
  checkMsg(_entry, msgid, msgstr) {
    return compareCounts("double spaces '  '", occurrences(msgid, "  "), occurrences(msgstr, "  "));
  },
};
