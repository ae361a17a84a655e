import type { MsgFinding, Rule, Span } from "../types.js";
import { occurrences } from "./compare.js";

const BRACKETS = [
  { open: "(", close: ")", name: "round" },
  { open: "[", close: "]", name: "square" },
  { open: "{", close: "}", name: "curly" },
  { open: "<", close: ">", name: "angle" },
] as const;

// "file(s)" style plurals are not real brackets.
function openings(s: string, open: string): Span[] {
  return occurrences(s, open).filter(
    ([start]) => !(open === "(" && (s.startsWith("(s)", start) || s.startsWith("(S)", start)))
  );
}

function closings(s: string, close: string): Span[] {
  return occurrences(s, close).filter(
    ([start]) =>
      !(close === ")" && start >= 2 && (s.startsWith("(s)", start - 2) || s.startsWith("(S)", start - 2)))
  );
}

const byStart = (a: Span, b: Span) => a[0] - b[0];

export const brackets: Rule = {
  id: "brackets",
  name: "Brackets",
  description: "Different number of round, square, curly or angle brackets",
  defaultSeverity: "info",
  defaultEnabled: true,
  groups: ["checks"],
  checkMsg(_entry, msgid, msgstr) {
    const findings: MsgFinding[] = [];

    for (const { open, close, name } of BRACKETS) {
      const idOpen = openings(msgid, open);
      const strOpen = openings(msgstr, open);
      const idClose = closings(msgid, close);
      const strClose = closings(msgstr, close);
      const [io, so, ic, sc] = [idOpen.length, strOpen.length, idClose.length, strClose.length];

      // Extra "(...)" pairs in the translation are allowed.
      if (open === "(" && io < so && ic < sc) continue;

      if ((io > so && ic > sc) || (io < so && ic < sc)) {
        const kind = io > so ? "missing" : "extra";
        findings.push({
          message:
            `${kind} opening and closing ${name} brackets ` +
            `'${open}' (${io} / ${so}) and '${close}' (${ic} / ${sc})`,
          source: [...idOpen, ...idClose].sort(byStart),
          translation: [...strOpen, ...strClose].sort(byStart),
        });
        continue;
      }

      if (io !== so) {
        findings.push({
          message: `${io > so ? "missing" : "extra"} opening ${name} brackets '${open}' (${io} / ${so})`,
          source: idOpen,
          translation: strOpen,
        });
      }
      if (ic !== sc) {
        findings.push({
          message: `${ic > sc ? "missing" : "extra"} closing ${name} brackets '${close}' (${ic} / ${sc})`,
          source: idClose,
          translation: strClose,
        });
      }
    }

    return findings;
  },
};
