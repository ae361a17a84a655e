import type { CatalogFinding, DictionarySlot, Rule, Span } from "../types.js";
import type { FormatLanguage } from "../../po/entry.js";
import type { Dictionary } from "../../spelling/dictionary.js";
import { wordTokens } from "../../format/tokens.js";

export interface MisspelledWords {
  /** Distinct misspelled words, sorted. */
  words: string[];
  /** Every occurrence of those words. */
  spans: Span[];
}

export function findMisspelled(
  text: string,
  dictionary: Dictionary,
  format: FormatLanguage | null
): MisspelledWords {
  const checked = new Set<string>();
  const misspelled = new Set<string>();
  const spans: Span[] = [];

  for (const { text: word, start, end } of wordTokens(text, format)) {
    if (!checked.has(word)) {
      checked.add(word);
      if (!dictionary.check(word)) misspelled.add(word);
    }
    if (misspelled.has(word)) spans.push([start, end]);
  }

  return { words: [...misspelled].sort(), spans };
}

function missingDictionary(slot: DictionarySlot): CatalogFinding[] {
  return slot.missing ? [{ message: slot.missing, severity: "warning" }] : [];
}

export const spellingCtxt: Rule = {
  id: "spelling-ctxt",
  name: "Spelling (context)",
  description: "Misspelled words in the context (msgctxt), checked against the source language",
  defaultSeverity: "info",
  defaultEnabled: false,
  groups: ["checks", "spelling"],
  checkCatalog({ sourceDictionary, enabled }) {
    // spelling-id reports the same dictionary
    if (enabled.has("spelling-id")) return [];
    return missingDictionary(sourceDictionary);
  },
  checkCtxt(entry, msgctxt, { sourceDictionary }) {
    if (!sourceDictionary.dictionary) return [];
    const { words, spans } = findMisspelled(msgctxt, sourceDictionary.dictionary, entry.format);
    if (words.length === 0) return [];
    return [{ message: `misspelled words in context: ${words.join(", ")}`, highlights: spans }];
  },
};

export const spellingId: Rule = {
  id: "spelling-id",
  name: "Spelling (source)",
  description: "Misspelled words in the source string, checked against the source language",
  defaultSeverity: "info",
  defaultEnabled: false,
  groups: ["checks", "spelling"],
  checkCatalog({ sourceDictionary }) {
    return missingDictionary(sourceDictionary);
  },
  checkMsg(entry, msgid, _msgstr, { sourceDictionary }) {
    if (!sourceDictionary.dictionary) return [];
    const { words, spans } = findMisspelled(msgid, sourceDictionary.dictionary, entry.format);
    if (words.length === 0) return [];
    return [
      { message: `misspelled words in source: ${words.join(", ")}`, source: spans, translation: [] },
    ];
  },
};

export const spellingStr: Rule = {
  id: "spelling-str",
  name: "Spelling (translation)",
  description: "Misspelled words in the translation, checked against the catalog's language",
  defaultSeverity: "info",
  defaultEnabled: false,
  groups: ["checks", "spelling"],
  checkCatalog({ translationDictionary }) {
    return missingDictionary(translationDictionary);
  },
  checkMsg(entry, _msgid, msgstr, { translationDictionary }) {
    if (!translationDictionary.dictionary) return [];
    const { words, spans } = findMisspelled(msgstr, translationDictionary.dictionary, entry.format);
    if (words.length === 0) return [];
    return [
      {
        message: `misspelled words in translation: ${words.join(", ")}`,
        source: [],
        translation: spans,
      },
    ];
  },
};
