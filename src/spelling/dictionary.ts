import nspell from "nspell";

/** Word validity lookup for one language. */
export interface Dictionary {
  readonly language: string;
  check(word: string): boolean;
}

/** Dictionary that accepts project-specific words on top of its own. */
export interface ExtendableDictionary extends Dictionary {
  add(word: string): void;
}

export interface WordListDictionary extends ExtendableDictionary {
  readonly size: number;
}

const NUMBER = /^\p{N}[\p{N}.,-]*$/u;

/** Numbers pass; hyphenated words pass when every part does. */
function wordChecker(lookup: (word: string) => boolean): (word: string) => boolean {
  const check = (word: string): boolean => {
    if (NUMBER.test(word) || lookup(word)) return true;
    if (word.includes("-")) {
      return word.split("-").every((part) => part.length > 0 && check(part));
    }
    return false;
  };
  return check;
}

function trimmed(word: string): string | null {
  const value = word.trim();
  return value.length > 0 ? value : null;
}

/**
 * Hunspell dictionary built from the contents of an `.aff` and a `.dic`
 * file. Affix rules apply, so `file/S` accepts `files`.
 */
export function createHunspellDictionary(
  language: string,
  aff: string | Buffer,
  dic: string | Buffer
): ExtendableDictionary {
  const spell = nspell(aff, dic);

  return {
    language,
    add(word) {
      const value = trimmed(word);
      if (value) spell.add(value);
    },
    check: wordChecker((word) => spell.correct(word)),
  };
}

/** Dictionary backed by a plain set of words, also matched in lowercase. */
export function createWordListDictionary(
  language: string,
  initial: Iterable<string> = []
): WordListDictionary {
  const words = new Set<string>();

  const add = (word: string) => {
    const value = trimmed(word);
    if (value) words.add(value);
  };

  for (const word of initial) add(word);

  return {
    language,
    get size() {
      return words.size;
    },
    add,
    check: wordChecker((word) => words.has(word) || words.has(word.toLowerCase())),
  };
}

/** One word per line; blank lines and `#` comments are ignored. */
export function parseWordList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}
