import type { Rule } from "../types.js";
import { compareCounts, occurrences } from "./compare.js";

export const pipes: Rule = {
  id: "pipes",
  name: "Pipes",
  description: "Different number of pipes",
  defaultSeverity: "info",
  defaultEnabled: true,
  groups: ["checks"],
  checkMsg(_entry, msgid, msgstr) {
    return compareCounts("pipes '|'", occurrences(msgid, "|"), occurrences(msgstr, "|"));
  },
};
