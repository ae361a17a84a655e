import { rawOffset } from "./escape.js";
import type { HeaderInfo } from "./header.js";

export type FieldName =
  | "msgctxt"
  | "msgid"
  | "msgid_plural"
  | `msgstr[${number}]`;

export type FormatLanguage = "c" | "python" | "python-brace";

/** One quoted fragment as written in the file. */
export interface Fragment {
  readonly line: number;
  /** Offset in the line of the first character after the opening quote. */
  readonly column: number;
  /** Text between the quotes, escapes untouched. */
  readonly raw: string;
  /** Range this fragment produced in the unescaped value. */
  readonly start: number;
  readonly end: number;
}

export interface Message {
  readonly value: string;
  /** Line of the keyword (`msgid`, `msgstr[1]`...). */
  readonly line: number;
  readonly fragments: readonly Fragment[];
}

export interface Entry {
  /** First line of the entry, comments included. */
  readonly line: number;
  readonly keywords: readonly string[];
  readonly fuzzy: boolean;
  readonly obsolete: boolean;
  readonly noqa: boolean;
  readonly noqaRules: readonly string[];
  readonly noWrap: boolean;
  readonly format: FormatLanguage | null;
  readonly encodingError: boolean;
  readonly msgctxt: Message | null;
  readonly msgid: Message;
  readonly msgidPlural: Message | null;
  /** Translations keyed by plural index, in ascending index order. */
  readonly msgstr: ReadonlyMap<number, Message>;
}

export interface SyntaxIssue {
  readonly line: number;
  readonly message: string;
  /** Raw text of the offending line. */
  readonly text: string;
}

export interface CatalogHeader extends HeaderInfo {
  /** Encoding used to decode strings, e.g. `utf-8`. */
  encoding: string;
  /** False when the declared charset is not one the runtime can decode. */
  charsetSupported: boolean;
}

export interface Catalog {
  readonly entries: readonly Entry[];
  readonly header: Readonly<CatalogHeader>;
  readonly syntaxErrors: readonly SyntaxIssue[];
}

export function msgstrField(index: number): FieldName {
  return `msgstr[${index}]`;
}

export function isHeader(entry: Entry): boolean {
  return entry.msgid.value === "";
}

export function hasPluralForm(entry: Entry): boolean {
  return entry.msgidPlural !== null;
}

/** True when at least one translation is non-empty (fuzzy entries included). */
export function isTranslated(entry: Entry): boolean {
  for (const msg of entry.msgstr.values()) {
    if (msg.value !== "") return true;
  }
  return false;
}

export function sourceTexts(entry: Entry): string[] {
  const texts = [entry.msgid.value];
  if (entry.msgidPlural) texts.push(entry.msgidPlural.value);
  return texts;
}

export function translatedTexts(entry: Entry): string[] {
  return [...entry.msgstr.values()].map((msg) => msg.value);
}

export function getField(entry: Entry, field: FieldName): Message | null {
  switch (field) {
    case "msgctxt":
      return entry.msgctxt;
    case "msgid":
      return entry.msgid;
    case "msgid_plural":
      return entry.msgidPlural;
    default:
      return entry.msgstr.get(parseInt(field.slice(7), 10)) ?? null;
  }
}

export interface FieldLine {
  line: number;
  field: FieldName;
  /** Unescaped value of the field. */
  text: string;
}

/** One line per field present, in file order. */
export function fieldLines(entry: Entry): FieldLine[] {
  const lines: FieldLine[] = [];
  const push = (field: FieldName, msg: Message | null) => {
    if (msg) lines.push({ line: msg.line, field, text: msg.value });
  };

  push("msgctxt", entry.msgctxt);
  push("msgid", entry.msgid);
  push("msgid_plural", entry.msgidPlural);
  for (const [index, msg] of entry.msgstr) {
    push(msgstrField(index), msg);
  }
  return lines;
}

/**
 * Position in the file of a character of the unescaped value.
 * Returns null for an offset outside the value.
 */
export function locateOffset(
  msg: Message,
  offset: number
): { line: number; column: number } | null {
  if (offset < 0 || offset > msg.value.length) return null;
  const last = msg.fragments.length - 1;
  for (const [i, fragment] of msg.fragments.entries()) {
    if (offset < fragment.end || (offset === fragment.end && i === last)) {
      return {
        line: fragment.line,
        column: fragment.column + rawOffset(fragment.raw, offset - fragment.start),
      };
    }
  }
  return null;
}
