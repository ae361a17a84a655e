import os from "node:os";
import { readFile } from "node:fs/promises";
import type { Catalog } from "../po/entry.js";
import { parseCatalog } from "../po/parser.js";
import type { Diagnostic } from "../diagnostics/types.js";
import { SYSTEM_RULES } from "../diagnostics/types.js";
import { fileDiagnostic } from "../diagnostics/build.js";
import { lintCatalog } from "../rules/engine.js";
import type { RuleSet } from "../rules/selection.js";
import type { DictionarySlot } from "../rules/types.js";
import { createDictionaryCache, type DictionaryCache } from "../spelling/cache.js";
import { computeStatistics, type Statistics } from "../stats/statistics.js";
import { EncodingError, errorMessage } from "../utils/errors.js";
import { mapPool } from "../utils/pool.js";
import { createChildLogger } from "../utils/logger.js";
import { discoverFiles } from "./discover.js";
import { compareCodeUnits } from "../utils/unicode.js";

const log = createChildLogger({ module: "scan" });

const SOURCE_DICTIONARY_RULES = ["spelling-ctxt", "spelling-id"];
const TRANSLATION_DICTIONARY_RULES = ["spelling-str"];

export interface FileResult {
  path: string;
  diagnostics: Diagnostic[];
  /** Null when the file could not be read or decoded. */
  statistics: Statistics | null;
}

export type FileReader = (path: string) => Promise<Uint8Array>;

export interface ScanOptions {
  ruleSet: RuleSet;
  /** Files processed at once; defaults to the available parallelism. */
  concurrency?: number;
  /** Force an encoding instead of each file's header charset. */
  encoding?: string;
  checkFuzzy?: boolean;
  checkNoqa?: boolean;
  checkObsolete?: boolean;
  /** Language of the msgids, for the source dictionary. */
  sourceLanguage?: string;
  dictsPath?: string;
  wordsPath?: string | null;
  /** Shared across scans when given; built from the paths otherwise. */
  dictionaries?: DictionaryCache;
  readFile?: FileReader;
}

export const DEFAULT_SOURCE_LANGUAGE = "en_US";
export const DEFAULT_DICTS_PATH = "/usr/share/hunspell";

/**
 * Check every PO file under `roots`.
 *
 * Files run through a bounded pool; results come back sorted by path
 * whatever the order files finish in.
 *
 * @throws PipelineError when a root is missing
 */
export async function scan(roots: readonly string[], options: ScanOptions): Promise<FileResult[]> {
  const startTime = Date.now();

  // 1. Discover files
  const files = await discoverFiles(roots);

  // 2. Check them through the pool
  const results = await checkFiles(files, options);

  log.info(
    {
      files: results.length,
      diagnostics: results.reduce((sum, r) => sum + r.diagnostics.length, 0),
      durationMs: Date.now() - startTime,
    },
    "Scan complete"
  );
  return results;
}

/** Check an explicit list of files, without discovery. */
export async function checkFiles(
  files: readonly string[],
  options: ScanOptions
): Promise<FileResult[]> {
  const dictionaries =
    options.dictionaries ??
    createDictionaryCache({
      dictsPath: options.dictsPath ?? DEFAULT_DICTS_PATH,
      wordsPath: options.wordsPath ?? null,
    });
  const concurrency = options.concurrency ?? os.availableParallelism();

  const results = await mapPool(files, concurrency, (file) =>
    checkFile(file, options, dictionaries)
  );
  return results.sort((a, b) => compareCodeUnits(a.path, b.path));
}

export async function checkFile(
  path: string,
  options: ScanOptions,
  dictionaries: DictionaryCache
): Promise<FileResult> {
  const read: FileReader = options.readFile ?? ((file) => readFile(file));

  let data: Uint8Array;
  try {
    data = await read(path);
  } catch (err) {
    log.warn({ err, path }, "Could not read file");
    return failed(path, SYSTEM_RULES.readError, "could not read file");
  }

  let catalog: Catalog;
  try {
    catalog = parseCatalog(data, { encoding: options.encoding });
  } catch (err) {
    if (err instanceof EncodingError) {
      return failed(path, SYSTEM_RULES.encodingError, err.message);
    }
    log.warn({ err, path }, "Could not parse file");
    return failed(path, SYSTEM_RULES.parseError, `could not parse file: ${errorMessage(err)}`);
  }

  const { ruleSet } = options;
  const wants = (ids: string[]) => ids.some((id) => ruleSet.has(id));
  const [sourceDictionary, translationDictionary] = await Promise.all([
    wantsSlot(wants(SOURCE_DICTIONARY_RULES), () =>
      dictionaries.get(options.sourceLanguage ?? DEFAULT_SOURCE_LANGUAGE)
    ),
    wantsSlot(wants(TRANSLATION_DICTIONARY_RULES), () =>
      dictionaries.get(catalog.header.language)
    ),
  ]);

  const diagnostics = lintCatalog(catalog, ruleSet, {
    path,
    checkFuzzy: options.checkFuzzy,
    checkNoqa: options.checkNoqa,
    checkObsolete: options.checkObsolete,
    sourceDictionary,
    translationDictionary,
  });

  log.debug({ path, entries: catalog.entries.length, diagnostics: diagnostics.length }, "File checked");
  return { path, diagnostics, statistics: computeStatistics(catalog) };
}

async function wantsSlot(
  wanted: boolean,
  load: () => Promise<DictionarySlot>
): Promise<DictionarySlot | undefined> {
  return wanted ? load() : undefined;
}

function failed(path: string, ruleId: string, message: string): FileResult {
  return { path, diagnostics: [fileDiagnostic(path, ruleId, "error", message)], statistics: null };
}
