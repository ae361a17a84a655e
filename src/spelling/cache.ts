import type { DictionarySlot } from "../rules/types.js";
import { loadDictionary, type DictionaryLoadResult, type DictionaryPaths } from "./loader.js";

export type DictionaryLoader = (
  language: string,
  paths: DictionaryPaths
) => Promise<DictionaryLoadResult>;

export interface DictionaryCache {
  get(language: string): Promise<DictionarySlot>;
  languages(): string[];
}

/**
 * Loads each language at most once. Concurrent callers for the same
 * language share the pending load.
 */
export function createDictionaryCache(
  paths: DictionaryPaths,
  loader: DictionaryLoader = loadDictionary
): DictionaryCache {
  const pending = new Map<string, Promise<DictionarySlot>>();

  return {
    get(language) {
      let slot = pending.get(language);
      if (!slot) {
        slot = loader(language, paths);
        pending.set(language, slot);
      }
      return slot;
    },
    languages() {
      return [...pending.keys()];
    },
  };
}
