import type { Rule } from "../types.js";

export const obsolete: Rule = {
  id: "obsolete",
  name: "Obsolete",
  description: "Obsolete entry (#~)",
  defaultSeverity: "info",
  defaultEnabled: false,
  groups: ["status"],
  checkEntry(entry) {
    return entry.obsolete ? [{ message: "obsolete entry" }] : [];
  },
};
