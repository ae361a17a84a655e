import type { Rule } from "../types.js";
import { compareCounts, occurrences } from "./compare.js";

const DOUBLE_QUOTES = ['"', "„", "”"] as const;

export const doubleQuotes: Rule = {
  id: "double-quotes",
  name: "Double quotes",
  description: "Different number of double quotes",
  defaultSeverity: "info",
  defaultEnabled: true,
  groups: ["checks"],
  checkMsg(_entry, msgid, msgstr) {
    return compareCounts(
      "double quotes",
      occurrences(msgid, DOUBLE_QUOTES),
      occurrences(msgstr, DOUBLE_QUOTES)
    );
  },
};
