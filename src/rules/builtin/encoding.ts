import type { Rule } from "../types.js";

export const encoding: Rule = {
  id: "encoding",
  name: "Encoding",
  description: "Unknown charset in the header, or bytes invalid for the catalog encoding",
  defaultSeverity: "info",
  defaultEnabled: true,
  groups: ["checks"],
  checkCatalog({ catalog }) {
    const { charset, charsetSupported } = catalog.header;
    if (charset === null || charsetSupported) return [];
    const header = catalog.entries.find((e) => e.msgid.value === "" && !e.obsolete);
    return [
      {
        message: `unknown encoding '${charset}', strings decoded as ${catalog.header.encoding.toUpperCase()}`,
        line: header?.msgid.line ?? 0,
      },
    ];
  },
  checkEntry(entry, { catalog }) {
    if (!entry.encodingError) return [];
    return [
      { message: `invalid characters for encoding ${catalog.header.encoding.toUpperCase()}` },
    ];
  },
};
