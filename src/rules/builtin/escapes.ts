import type { Rule } from "../types.js";
import { compareCounts, occurrences } from "./compare.js";

/**
 * Escaped backslashes (`\\`) are compared first; single backslashes only
 * when those counts agree.
 */
export const escapes: Rule = {
  id: "escapes",
  name: "Escapes",
  description: "Different number of escape characters",
  defaultSeverity: "error",
  defaultEnabled: true,
  groups: ["checks"],
  checkMsg(_entry, msgid, msgstr) {
    const escaped = compareCounts(
      "escaped escape characters '\\\\'",
      occurrences(msgid, "\\\\"),
      occurrences(msgstr, "\\\\")
    );
    if (escaped.length > 0) return escaped;
    return compareCounts(
      "escape characters '\\'",
      occurrences(msgid, "\\"),
      occurrences(msgstr, "\\")
    );
  },
};
