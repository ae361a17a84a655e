import type { Diagnostic } from "../diagnostics/types.js";
import { compareCodeUnits } from "../utils/unicode.js";

const SPELLING_RULES = new Set(["spelling-ctxt", "spelling-id", "spelling-str"]);

/** Distinct misspelled words found by the spelling rules, sorted. */
export function misspelledWords(diagnostics: readonly Diagnostic[]): string[] {
  const words = new Set<string>();
  for (const diagnostic of diagnostics) {
    if (!SPELLING_RULES.has(diagnostic.ruleId)) continue;
    for (const { field, start, end } of diagnostic.highlights) {
      const line = diagnostic.lines.find((l) => l.field === field);
      if (line) words.add(line.text.slice(start, end));
    }
  }
  return [...words].sort(compareCodeUnits);
}

export function formatMisspelled(diagnostics: readonly Diagnostic[]): string {
  return misspelledWords(diagnostics).join("\n");
}
