export { parseCatalog, splitLines, type ParseOptions } from "./po/parser.js";
export {
  fieldLines,
  getField,
  hasPluralForm,
  isHeader,
  isTranslated,
  locateOffset,
  msgstrField,
  sourceTexts,
  translatedTexts,
  type Catalog,
  type CatalogHeader,
  type Entry,
  type FieldName,
  type FormatLanguage,
  type Fragment,
  type Message,
  type SyntaxIssue,
} from "./po/entry.js";
export { escapePo, unescapePo } from "./po/escape.js";
export { parseHeader, type HeaderInfo } from "./po/header.js";
export { formatParser, type FormatParser } from "./format/parsers.js";
export { countChars, countWords, formatTokens, wordTokens } from "./format/tokens.js";
export type { ContextLine, Diagnostic, Highlight, Severity } from "./diagnostics/types.js";
export { SEVERITIES, SYSTEM_RULES } from "./diagnostics/types.js";
export type { Rule, RuleContext, RuleGroup } from "./rules/types.js";
export { BUILTIN_RULES, REGISTRY, createRegistry, type RuleRegistry } from "./rules/registry.js";
export {
  RULE_GROUPS,
  expandToken,
  resolveRuleSet,
  resolveSelection,
  type RuleSet,
  type SelectionStep,
} from "./rules/selection.js";
export { lintCatalog, type LintOptions } from "./rules/engine.js";
export {
  createHunspellDictionary,
  createWordListDictionary,
  type Dictionary,
} from "./spelling/dictionary.js";
export { loadDictionary, type DictionaryPaths } from "./spelling/loader.js";
export { createDictionaryCache, type DictionaryCache } from "./spelling/cache.js";
export { discoverFiles } from "./pipeline/discover.js";
export { checkFiles, scan, type FileResult, type ScanOptions } from "./pipeline/scan.js";
export {
  computeStatistics,
  percent,
  sortStatistics,
  type Statistics,
  type StatisticsSort,
} from "./stats/statistics.js";
export { aggregate, exitCode, type Report, type ReportSummary } from "./report/aggregate.js";
export { sortDiagnostics, type DiagnosticSort } from "./report/sort.js";
export { formatDiagnostic, formatReport, formatStatistics, formatSummary } from "./report/text.js";
export { formatJson, toJsonDiagnostic } from "./report/json.js";
export { misspelledWords } from "./report/misspelled.js";
export { loadConfig } from "./config-loader/loader.js";
export { parseConfig, type PolintConfig } from "./config-loader/schema.js";
export {
  ConfigError,
  EncodingError,
  PipelineError,
  PolintError,
  UnknownRuleError,
} from "./utils/errors.js";
