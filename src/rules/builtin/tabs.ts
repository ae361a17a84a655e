import type { Rule } from "../types.js";
import { compareCounts, occurrences } from "./compare.js";

export const tabs: Rule = {
  id: "tabs",
  name: "Tabs",
  description: "Different number of tabulations",
  defaultSeverity: "error",
  defaultEnabled: true,
  groups: ["checks"],
  checkMsg(_entry, msgid, msgstr) {
    return compareCounts("tabs '\\t'", occurrences(msgid, "\t"), occurrences(msgstr, "\t"));
  },
};
