import type { Rule } from "../types.js";

export const untranslated: Rule = {
  id: "untranslated",
  name: "Untranslated",
  description: "Message without translation",
  defaultSeverity: "info",
  defaultEnabled: false,
  groups: ["status"],
  visitsEmptyTranslations: true,
  checkMsg(_entry, _msgid, msgstr) {
    if (msgstr !== "") return [];
    return [{ message: "untranslated message", source: [], translation: [] }];
  },
};
