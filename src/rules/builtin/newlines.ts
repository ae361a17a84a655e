import type { MsgFinding, Rule, Span } from "../types.js";
import { compareCounts, occurrences } from "./compare.js";

const KINDS = [
  { char: "\r", plural: "carriage returns '\\r'", singular: "carriage return '\\r'" },
  { char: "\n", plural: "line feeds '\\n'", singular: "line feed '\\n'" },
] as const;

/** Span of `char` at the beginning or end of `s`, when it is there. */
function edge(s: string, char: string, where: "beginning" | "end"): Span[] {
  if (where === "beginning") return s.startsWith(char) ? [[0, char.length]] : [];
  return s.endsWith(char) ? [[s.length - char.length, s.length]] : [];
}

export const newlines: Rule = {
  id: "newlines",
  name: "Newlines",
  description: "Different carriage returns or line feeds, in number or at the ends",
  defaultSeverity: "error",
  defaultEnabled: true,
  groups: ["checks"],
  checkMsg(_entry, msgid, msgstr) {
    const findings: MsgFinding[] = [];

    for (const { char, plural } of KINDS) {
      findings.push(...compareCounts(plural, occurrences(msgid, char), occurrences(msgstr, char)));
    }

    for (const where of ["beginning", "end"] as const) {
      for (const { char, singular } of KINDS) {
        const source = edge(msgid, char, where);
        const translation = edge(msgstr, char, where);
        if (source.length === translation.length) continue;
        const kind = source.length > translation.length ? "missing" : "extra";
        findings.push({ message: `${kind} ${singular} at the ${where}`, source, translation });
      }
    }

    return findings;
  },
};
