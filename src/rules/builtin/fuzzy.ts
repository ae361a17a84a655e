import type { Rule } from "../types.js";

export const fuzzy: Rule = {
  id: "fuzzy",
  name: "Fuzzy",
  description: "Entry flagged as fuzzy",
  defaultSeverity: "info",
  defaultEnabled: false,
  groups: ["status"],
  checkEntry(entry) {
    return entry.fuzzy ? [{ message: "fuzzy entry" }] : [];
  },
};
