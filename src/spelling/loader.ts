import { readFile } from "node:fs/promises";
import path from "node:path";
import {
  createHunspellDictionary,
  parseWordList,
  type Dictionary,
  type ExtendableDictionary,
} from "./dictionary.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "dictionary-loader" });

export interface DictionaryPaths {
  /** Directory holding hunspell `<language>.aff` and `<language>.dic` files. */
  dictsPath: string;
  /** Optional directory of `<language>.dic` extra word lists. */
  wordsPath?: string | null;
}

export type DictionaryLoadResult =
  | { dictionary: Dictionary; missing: null }
  | { dictionary: null; missing: string };

/** `pt_BR` is looked up as `pt_BR`, then `pt`. */
export function languageCandidates(language: string): string[] {
  const candidates = language ? [language] : [];
  const underscore = language.indexOf("_");
  if (underscore > 0) candidates.push(language.slice(0, underscore));
  return candidates;
}

async function readIfExists(file: string): Promise<string | null> {
  try {
    return await readFile(file, "utf-8");
  } catch (err) {
    log.debug({ err, file }, "Dictionary file not readable");
    return null;
  }
}

export async function loadDictionary(
  language: string,
  paths: DictionaryPaths
): Promise<DictionaryLoadResult> {
  for (const candidate of languageCandidates(language)) {
    const base = path.join(paths.dictsPath, candidate);
    const [aff, dic] = await Promise.all([readIfExists(`${base}.aff`), readIfExists(`${base}.dic`)]);
    if (aff === null || dic === null) continue;

    const dictionary = createHunspellDictionary(language, aff, dic);
    if (paths.wordsPath) {
      await addExtraWords(dictionary, language, paths.wordsPath);
    }
    log.debug({ language, file: candidate }, "Dictionary loaded");
    return { dictionary, missing: null };
  }

  return {
    dictionary: null,
    missing: `dictionary not found for language '${language}' (path: ${paths.dictsPath}), spelling rule ignored`,
  };
}

async function addExtraWords(
  dictionary: ExtendableDictionary,
  language: string,
  wordsPath: string
): Promise<void> {
  for (const candidate of languageCandidates(language)) {
    const content = await readIfExists(path.join(wordsPath, `${candidate}.dic`));
    if (content === null) continue;
    for (const word of parseWordList(content)) dictionary.add(word);
    return;
  }
}
