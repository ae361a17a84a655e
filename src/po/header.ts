/** Metadata read from the header entry (the entry with an empty msgid). */
export interface HeaderInfo {
  /** Full language tag, e.g. `pt_BR`. Empty when the header has none. */
  language: string;
  /** Language without country, e.g. `pt`. */
  languageCode: string;
  country: string;
  /** Charset as declared in `Content-Type`, or null. */
  charset: string | null;
  /** From `Plural-Forms`; 0 when absent or unreadable. */
  nplurals: number;
  pluralExpression: string | null;
}

export const EMPTY_HEADER: HeaderInfo = Object.freeze({
  language: "",
  languageCode: "",
  country: "",
  charset: null,
  nplurals: 0,
  pluralExpression: null,
});

export function parseHeader(value: string): HeaderInfo {
  const header: HeaderInfo = { ...EMPTY_HEADER };

  for (const line of value.split("\n")) {
    const colon = line.indexOf(":");
    if (colon < 0) continue;
    const keyword = line.slice(0, colon).trim().toLowerCase();
    const field = line.slice(colon + 1);

    if (keyword === "language") {
      header.language = field.trim();
      const underscore = field.indexOf("_");
      if (underscore >= 0) {
        header.languageCode = field.slice(0, underscore).trim();
        header.country = field.slice(underscore + 1).trim();
      } else {
        header.languageCode = header.language;
      }
    } else if (keyword === "content-type") {
      const match = /charset=([^\s;]*)/.exec(field);
      if (match && match[1].length > 0) header.charset = match[1];
    } else if (keyword === "plural-forms") {
      const nplurals = /nplurals=(\d+)/.exec(field);
      if (nplurals) header.nplurals = parseInt(nplurals[1], 10);
      const plural = /plural=([^;]*);?/.exec(field.replace(/nplurals=/, ""));
      if (plural) header.pluralExpression = plural[1].trim();
    }
  }

  return header;
}
