import { parseCatalog } from "../../src/po/parser.js";
import type { Catalog } from "../../src/po/entry.js";

export function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function catalogFrom(lines: string[]): Catalog {
  return parseCatalog(bytes(lines.join("\n")));
}

export const FR_HEADER = [
  'msgid ""',
  'msgstr ""',
  '"Language: fr\\n"',
  '"Content-Type: text/plain; charset=UTF-8\\n"',
  '"Plural-Forms: nplurals=2; plural=(n > 1);\\n"',
];

/** Header (lines 1-5) followed by one entry per kind. */
export const SAMPLE_PO = [
  ...FR_HEADER,
  "",
  "#: src/main.c:10",
  "#, c-format",
  'msgid "Hello %s"',
  'msgstr "Bonjour %s"',
  "",
  'msgctxt "menu"',
  'msgid "File"',
  'msgstr "Fichier"',
  "",
  "#, fuzzy",
  'msgid "One file"',
  'msgid_plural "%d files"',
  'msgstr[0] "Un fichier"',
  'msgstr[1] "%d fichiers"',
  "",
  '#~ msgid "Old"',
  '#~ msgstr "Vieux"',
  "",
].join("\n");

/** Every line has a problem the parser reports. */
export const BROKEN_PO = [
  'msgid "a"',
  'msgstr "b',
  "",
  'msgid "c"',
  'msgstr "d\\q"',
  "",
  "foo bar",
  'msgid "e"',
  'msgstr "f"',
  "",
  'msgstr[x] "h"',
  '"i"',
  "",
  'msgstr "j"',
].join("\n");
