import type { Catalog } from "../po/entry.js";
import { isHeader, isTranslated } from "../po/entry.js";
import { countChars, countWords } from "../format/tokens.js";
import { compareCodeUnits } from "../utils/unicode.js";

export type EntryStatus = "translated" | "fuzzy" | "untranslated" | "obsolete";

export const STATUSES: readonly EntryStatus[] = ["translated", "fuzzy", "untranslated", "obsolete"];

export interface EntryCounts {
  total: number;
  translated: number;
  fuzzy: number;
  untranslated: number;
  obsolete: number;
}

/** Word or character counts, split by entry status. */
export interface TextCounts {
  sourceTotal: number;
  source: Record<EntryStatus, number>;
  /** Counted on msgstr[0]; always 0 for untranslated entries. */
  translation: Record<EntryStatus, number>;
}

export interface Statistics {
  entries: EntryCounts;
  words: TextCounts;
  chars: TextCounts;
}

const byStatus = (): Record<EntryStatus, number> => ({
  translated: 0,
  fuzzy: 0,
  untranslated: 0,
  obsolete: 0,
});

export function emptyStatistics(): Statistics {
  return {
    entries: { total: 0, translated: 0, fuzzy: 0, untranslated: 0, obsolete: 0 },
    words: { sourceTotal: 0, source: byStatus(), translation: byStatus() },
    chars: { sourceTotal: 0, source: byStatus(), translation: byStatus() },
  };
}

/** Fuzzy wins over obsolete, obsolete over translated. */
export function entryStatus(entry: {
  fuzzy: boolean;
  obsolete: boolean;
  translated: boolean;
}): EntryStatus {
  if (entry.fuzzy) return "fuzzy";
  if (entry.obsolete) return "obsolete";
  if (entry.translated) return "translated";
  return "untranslated";
}

/**
 * Entry, word and character counts of a catalog, header excluded.
 * Placeholders of the entry's format language are not counted as words.
 */
export function computeStatistics(catalog: Catalog): Statistics {
  const stats = emptyStatistics();

  for (const entry of catalog.entries) {
    if (isHeader(entry)) continue;
    const status = entryStatus({
      fuzzy: entry.fuzzy,
      obsolete: entry.obsolete,
      translated: isTranslated(entry),
    });

    const msgid = entry.msgid.value;
    const msgstr = entry.msgstr.get(0)?.value ?? "";
    const idWords = countWords(msgid, entry.format);
    const idChars = countChars(msgid, entry.format);

    stats.entries.total++;
    stats.entries[status]++;
    stats.words.sourceTotal += idWords;
    stats.chars.sourceTotal += idChars;
    stats.words.source[status] += idWords;
    stats.chars.source[status] += idChars;
    if (status !== "untranslated") {
      stats.words.translation[status] += countWords(msgstr, entry.format);
      stats.chars.translation[status] += countChars(msgstr, entry.format);
    }
  }

  return stats;
}

export function addStatistics(target: Statistics, other: Statistics): Statistics {
  target.entries.total += other.entries.total;
  for (const status of STATUSES) {
    target.entries[status] += other.entries[status];
    target.words.source[status] += other.words.source[status];
    target.words.translation[status] += other.words.translation[status];
    target.chars.source[status] += other.chars.source[status];
    target.chars.translation[status] += other.chars.translation[status];
  }
  target.words.sourceTotal += other.words.sourceTotal;
  target.chars.sourceTotal += other.chars.sourceTotal;
  return target;
}

/** Integer percentage, rounded down; 0 for an empty total. */
export function percent(count: number, total: number): number {
  return total === 0 ? 0 : Math.floor((count * 100) / total);
}

/** Ratio scaled to 1,000,000, for sorting with more precision than percent. */
export function ratio(count: number, total: number): number {
  return total === 0 ? 0 : Math.floor((count * 1_000_000) / total);
}

export function entryPercentages(entries: EntryCounts): Record<EntryStatus, number> {
  return {
    translated: percent(entries.translated, entries.total),
    fuzzy: percent(entries.fuzzy, entries.total),
    untranslated: percent(entries.untranslated, entries.total),
    obsolete: percent(entries.obsolete, entries.total),
  };
}

export type StatisticsSort = "path" | "status";

export interface FileStatistics {
  path: string;
  statistics: Statistics;
}

/**
 * Sort per-file statistics in place. `status` puts the most translated files
 * first: ratios and counts of each status descending, then path.
 */
export function sortStatistics<T extends FileStatistics>(items: T[], order: StatisticsSort): T[] {
  const byPath = (a: T, b: T) => compareCodeUnits(a.path, b.path);
  if (order === "path") return items.sort(byPath);

  const key = ({ statistics: { entries } }: T): number[] =>
    STATUSES.flatMap((status) => [ratio(entries[status], entries.total), entries[status]]);

  return items.sort((a, b) => {
    const ka = key(a);
    const kb = key(b);
    for (let i = 0; i < ka.length; i++) {
      const diff = (kb[i] ?? 0) - (ka[i] ?? 0);
      if (diff !== 0) return diff;
    }
    return byPath(a, b);
  });
}

export function totalStatistics(items: readonly FileStatistics[]): Statistics {
  return items.reduce((total, item) => addStatistics(total, item.statistics), emptyStatistics());
}
