import type { Rule } from "./types.js";
import { blank } from "./builtin/blank.js";
import { brackets } from "./builtin/brackets.js";
import { cFormats } from "./builtin/c-formats.js";
import { doubleQuotes } from "./builtin/double-quotes.js";
import { doubleSpaces } from "./builtin/double-spaces.js";
import { encoding } from "./builtin/encoding.js";
import { escapes } from "./builtin/escapes.js";
import { fuzzy } from "./builtin/fuzzy.js";
import { long, short } from "./builtin/length.js";
import { newlines } from "./builtin/newlines.js";
import { obsolete } from "./builtin/obsolete.js";
import { pipes } from "./builtin/pipes.js";
import { plurals } from "./builtin/plurals.js";
import { puncEnd, puncStart } from "./builtin/punctuation.js";
import { spellingCtxt, spellingId, spellingStr } from "./builtin/spelling.js";
import { tabs } from "./builtin/tabs.js";
import { unchanged } from "./builtin/unchanged.js";
import { untranslated } from "./builtin/untranslated.js";
import { whitespaceEnd, whitespaceStart } from "./builtin/whitespace.js";

export interface RuleRegistry {
  /** Rules in registration order; the engine runs them in this order. */
  readonly rules: readonly Rule[];
  get(id: string): Rule | undefined;
  has(id: string): boolean;
}

/** @throws Error when two rules share an id */
export function createRegistry(rules: readonly Rule[]): RuleRegistry {
  const byId = new Map<string, Rule>();
  for (const rule of rules) {
    if (byId.has(rule.id)) {
      throw new Error(`Duplicate rule id: ${rule.id}`);
    }
    byId.set(rule.id, Object.freeze(rule));
  }

  return Object.freeze({
    rules: Object.freeze([...byId.values()]),
    get: (id: string) => byId.get(id),
    has: (id: string) => byId.has(id),
  });
}

export const BUILTIN_RULES: readonly Rule[] = [
  blank,
  brackets,
  cFormats,
  doubleQuotes,
  doubleSpaces,
  encoding,
  escapes,
  fuzzy,
  long,
  newlines,
  obsolete,
  pipes,
  plurals,
  puncEnd,
  puncStart,
  short,
  spellingCtxt,
  spellingId,
  spellingStr,
  tabs,
  unchanged,
  untranslated,
  whitespaceEnd,
  whitespaceStart,
];

export const REGISTRY = createRegistry(BUILTIN_RULES);
