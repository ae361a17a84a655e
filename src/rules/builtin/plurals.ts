import type { Rule } from "../types.js";

export const plurals: Rule = {
  id: "plurals",
  name: "Plurals",
  description: "Number of plural translations different from the header's nplurals",
  defaultSeverity: "error",
  defaultEnabled: true,
  groups: ["checks"],
  checkEntry(entry, { catalog }) {
    const expected = catalog.header.nplurals;
    if (expected === 0 || entry.msgidPlural === null) return [];

    const found = entry.msgstr.size;
    if (found === expected) return [];
    const kind = found < expected ? "missing" : "extra";
    return [
      { message: `${kind} translated plural form (found: ${found}, expected: ${expected})` },
    ];
  },
};
