import { loadEnv, type Env } from "./config/env.js";
import { loadConfig } from "./config-loader/loader.js";
import type { PolintConfig } from "./config-loader/schema.js";
import { resolveRuleSet } from "./rules/selection.js";
import { scan, type ScanOptions } from "./pipeline/scan.js";
import { aggregate, allDiagnostics, exitCode, type Report } from "./report/aggregate.js";
import { sortDiagnostics } from "./report/sort.js";
import { formatReport, formatStatistics } from "./report/text.js";
import { formatJson } from "./report/json.js";
import { formatMisspelled } from "./report/misspelled.js";
import { sortStatistics } from "./stats/statistics.js";
import { PolintError, errorMessage } from "./utils/errors.js";
import { createChildLogger } from "./utils/logger.js";

const log = createChildLogger({ module: "cli" });

export const EXIT_FATAL = 2;

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface RunOptions {
  env?: Env;
  config?: PolintConfig;
  /** Passed through to the pipeline, mostly for tests. */
  readFile?: ScanOptions["readFile"];
}

/** Everything the run prints to stdout. */
export function renderReport(report: Report, config: PolintConfig): string {
  const diagnostics = sortDiagnostics(allDiagnostics(report), config.sort);
  const blocks: string[] = [];

  switch (config.output) {
    case "json":
      blocks.push(formatJson(diagnostics));
      break;
    case "misspelled": {
      const words = formatMisspelled(diagnostics);
      if (words !== "") blocks.push(words);
      break;
    }
    default:
      blocks.push(
        formatReport(report, diagnostics, {
          ruleCounts: config.ruleCounts,
          fileCounts: config.fileCounts,
        })
      );
  }

  if (config.statistics.enabled && report.statistics.length > 0) {
    const items = sortStatistics([...report.statistics], config.statistics.sort);
    blocks.push(formatStatistics(items, report.totalStatistics, { words: config.statistics.words }));
  }
  return blocks.join("\n\n");
}

/**
 * Check the PO files under `paths` and print the report.
 * Returns the exit code: 0 clean, 1 problems found, 2 fatal error.
 */
export async function run(paths: readonly string[], io: CliIo, options: RunOptions = {}): Promise<number> {
  const startTime = Date.now();
  try {
    // 1. Environment and config
    const env = options.env ?? loadEnv();
    const config = options.config ?? (await loadConfig({ env }));

    // 2. Rules, before any file is read
    const ruleSet = resolveRuleSet({
      select: config.select,
      ignore: config.ignore,
      severities: config.severities,
      overrides: config.overrides,
    });

    // 3. Scan
    const results = await scan(paths, {
      ruleSet,
      concurrency: config.concurrency,
      encoding: config.encoding,
      checkFuzzy: config.checkFuzzy,
      checkNoqa: config.checkNoqa,
      checkObsolete: config.checkObsolete,
      sourceLanguage: config.spelling.sourceLanguage,
      dictsPath: config.spelling.dictsPath,
      wordsPath: config.spelling.wordsPath,
      readFile: options.readFile,
    });

    // 4. Report
    const report = aggregate(results, Date.now() - startTime);
    const output = renderReport(report, config);
    if (output !== "") io.stdout(`${output}\n`);
    return exitCode(report);
  } catch (err) {
    if (!(err instanceof PolintError)) {
      log.error({ err }, "Unexpected failure");
    }
    io.stderr(`polint: ${errorMessage(err)}\n`);
    return EXIT_FATAL;
  }
}
