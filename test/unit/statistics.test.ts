import { describe, it, expect } from "vitest";
import {
  computeStatistics,
  emptyStatistics,
  entryPercentages,
  entryStatus,
  percent,
  ratio,
  sortStatistics,
  totalStatistics,
  type EntryCounts,
  type FileStatistics,
} from "../../src/stats/statistics.js";
import { parseCatalog } from "../../src/po/parser.js";
import { FR_HEADER, SAMPLE_PO, bytes, catalogFrom } from "../fixtures/sample-catalogs.js";

function withEntries(path: string, entries: Partial<EntryCounts>): FileStatistics {
  const statistics = emptyStatistics();
  Object.assign(statistics.entries, entries);
  return { path, statistics };
}

describe("entryStatus", () => {
  it("ranks fuzzy over obsolete over translated", () => {
    expect(entryStatus({ fuzzy: true, obsolete: true, translated: true })).toBe("fuzzy");
    expect(entryStatus({ fuzzy: false, obsolete: true, translated: true })).toBe("obsolete");
    expect(entryStatus({ fuzzy: false, obsolete: true, translated: false })).toBe("obsolete");
    expect(entryStatus({ fuzzy: false, obsolete: false, translated: true })).toBe("translated");
    expect(entryStatus({ fuzzy: false, obsolete: false, translated: false })).toBe("untranslated");
  });
});

describe("computeStatistics", () => {
  it("counts entries, words and characters by status", () => {
    const stats = computeStatistics(parseCatalog(bytes(SAMPLE_PO)));

    expect(stats.entries).toEqual({
      total: 4,
      translated: 2,
      fuzzy: 1,
      untranslated: 0,
      obsolete: 1,
    });
    // placeholders are not words: "Hello %s" has one
    expect(stats.words).toEqual({
      sourceTotal: 5,
      source: { translated: 2, fuzzy: 2, untranslated: 0, obsolete: 1 },
      translation: { translated: 2, fuzzy: 2, untranslated: 0, obsolete: 1 },
    });
    expect(stats.chars).toEqual({
      sourceTotal: 19,
      source: { translated: 9, fuzzy: 7, untranslated: 0, obsolete: 3 },
      translation: { translated: 14, fuzzy: 9, untranslated: 0, obsolete: 5 },
    });
  });

  it("counts no translation words for untranslated entries", () => {
    const stats = computeStatistics(
      catalogFrom([...FR_HEADER, "", 'msgid "Good bye"', 'msgstr ""'])
    );
    expect(stats.entries.untranslated).toBe(1);
    expect(stats.words.source.untranslated).toBe(2);
    expect(stats.words.translation.untranslated).toBe(0);
  });

  it("gives a fully translated large catalog 100%", () => {
    const lines = [...FR_HEADER];
    for (let i = 0; i < 3853; i++) {
      lines.push("", `msgid "Message ${i}"`, `msgstr "Message traduit ${i}"`);
    }
    const stats = computeStatistics(catalogFrom(lines));

    expect(stats.entries.total).toBe(3853);
    expect(entryPercentages(stats.entries)).toEqual({
      translated: 100,
      fuzzy: 0,
      untranslated: 0,
      obsolete: 0,
    });
  });
});

describe("percent and ratio", () => {
  it("round down and handle empty totals", () => {
    expect(percent(1, 3)).toBe(33);
    expect(percent(2, 3)).toBe(66);
    expect(percent(0, 0)).toBe(0);
    expect(ratio(1, 3)).toBe(333333);
    expect(ratio(5, 0)).toBe(0);
  });
});

describe("sortStatistics", () => {
  const items = () => [
    withEntries("z.po", { total: 2, translated: 2 }),
    withEntries("m.po", { total: 2, translated: 1, untranslated: 1 }),
    withEntries("b.po", { total: 2, translated: 2 }),
  ];

  it("sorts by path", () => {
    expect(sortStatistics(items(), "path").map((i) => i.path)).toEqual(["b.po", "m.po", "z.po"]);
  });

  it("puts the most translated files first", () => {
    expect(sortStatistics(items(), "status").map((i) => i.path)).toEqual(["b.po", "z.po", "m.po"]);
  });

  it("breaks equal ratios by count", () => {
    const sorted = sortStatistics(
      [
        withEntries("a.po", { total: 2, translated: 1, fuzzy: 1 }),
        withEntries("b.po", { total: 4, translated: 2, fuzzy: 2 }),
      ],
      "status"
    );
    expect(sorted.map((i) => i.path)).toEqual(["b.po", "a.po"]);
  });
});

describe("totalStatistics", () => {
  it("sums every file", () => {
    const total = totalStatistics([
      withEntries("a.po", { total: 2, translated: 2 }),
      withEntries("b.po", { total: 4, translated: 1, fuzzy: 1, untranslated: 2 }),
    ]);
    expect(total.entries).toEqual({ total: 6, translated: 3, fuzzy: 1, untranslated: 2, obsolete: 0 });
  });
});
