import type { Severity } from "../diagnostics/types.js";
import type { Catalog, Entry } from "../po/entry.js";
import type { Dictionary } from "../spelling/dictionary.js";

export type RuleGroup = "checks" | "status" | "spelling";

/** `[start, end)` in UTF-16 units of the string being checked. */
export type Span = readonly [start: number, end: number];

export interface DictionarySlot {
  dictionary: Dictionary | null;
  /** Why `dictionary` is null, when a lookup was attempted. */
  missing: string | null;
}

export interface RuleContext {
  catalog: Catalog;
  /** Ids of the enabled rules. */
  enabled: ReadonlySet<string>;
  /** Dictionary for msgid and msgctxt. */
  sourceDictionary: DictionarySlot;
  /** Dictionary for the catalog's language. */
  translationDictionary: DictionarySlot;
}

export interface CatalogFinding {
  message: string;
  line?: number;
  /** Replaces the rule's severity for this finding. */
  severity?: Severity;
}

export interface EntryFinding {
  message: string;
}

export interface CtxtFinding {
  message: string;
  highlights: Span[];
}

export interface MsgFinding {
  message: string;
  source: Span[];
  translation: Span[];
}

export interface Rule {
  id: string;
  name: string;
  description: string;
  defaultSeverity: Severity;
  defaultEnabled: boolean;
  groups: readonly RuleGroup[];
  /** Also receive message pairs whose translation is empty. */
  visitsEmptyTranslations?: boolean;
  /** Runs once per catalog, before any entry. */
  checkCatalog?(ctx: RuleContext): CatalogFinding[];
  checkEntry?(entry: Entry, ctx: RuleContext): EntryFinding[];
  checkCtxt?(entry: Entry, msgctxt: string, ctx: RuleContext): CtxtFinding[];
  /** Called with msgid/msgstr[0] and msgid_plural/msgstr[n] pairs. */
  checkMsg?(entry: Entry, msgid: string, msgstr: string, ctx: RuleContext): MsgFinding[];
}
