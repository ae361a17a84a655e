import type { Catalog, Entry, FieldName, Message } from "../po/entry.js";
import { fieldLines, getField, isHeader, isTranslated, locateOffset, msgstrField } from "../po/entry.js";
import type { ContextLine, Diagnostic, Highlight, Severity } from "../diagnostics/types.js";
import { SYSTEM_RULES } from "../diagnostics/types.js";
import { normalizeHighlights } from "../diagnostics/build.js";
import type { RuleSet } from "./selection.js";
import type { DictionarySlot, Rule, RuleContext, Span } from "./types.js";
import { createChildLogger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";

const log = createChildLogger({ module: "rule-engine" });

const NO_DICTIONARY: DictionarySlot = Object.freeze({ dictionary: null, missing: null });

export interface LintOptions {
  path: string;
  /** Check fuzzy entries even when the fuzzy rule is off. */
  checkFuzzy?: boolean;
  /** Check entries flagged `noqa`. */
  checkNoqa?: boolean;
  /** Check obsolete entries even when the obsolete rule is off. */
  checkObsolete?: boolean;
  sourceDictionary?: DictionarySlot;
  translationDictionary?: DictionarySlot;
}

/**
 * Run every rule of `ruleSet` over `catalog`.
 *
 * Output order: syntax errors, catalog-level findings, then entries in file
 * order with rules in registration order. The same input always gives the
 * same output.
 */
export function lintCatalog(catalog: Catalog, ruleSet: RuleSet, options: LintOptions): Diagnostic[] {
  const { path } = options;
  const diagnostics: Diagnostic[] = [];
  const ctx: RuleContext = {
    catalog,
    enabled: ruleSet.ids,
    sourceDictionary: options.sourceDictionary ?? NO_DICTIONARY,
    translationDictionary: options.translationDictionary ?? NO_DICTIONARY,
  };

  for (const issue of catalog.syntaxErrors) {
    diagnostics.push({
      path,
      ruleId: SYSTEM_RULES.syntaxError,
      severity: "error",
      message: issue.message,
      line: issue.line,
      highlights: [],
      lines: [{ line: issue.line, field: null, text: issue.text }],
    });
  }

  const guarded = (rule: Rule, line: number, run: () => Diagnostic[]) => {
    try {
      diagnostics.push(...run());
    } catch (err) {
      log.warn({ err, rule: rule.id, path, line }, "Rule execution failed");
      diagnostics.push({
        path,
        ruleId: SYSTEM_RULES.ruleError,
        severity: "error",
        message: `rule '${rule.id}' failed: ${errorMessage(err)}`,
        line,
        highlights: [],
        lines: [],
      });
    }
  };

  for (const { rule, severity } of ruleSet.rules) {
    const check = rule.checkCatalog;
    if (!check) continue;
    guarded(rule, 0, () =>
      check(ctx).map((finding) => ({
        path,
        ruleId: rule.id,
        severity: finding.severity ?? severity,
        message: finding.message,
        line: finding.line ?? 0,
        highlights: [],
        lines: [],
      }))
    );
  }

  const visitsEmpty = ruleSet.rules.some(({ rule }) => rule.visitsEmptyTranslations === true);
  let checked = 0;

  for (const entry of catalog.entries) {
    if (isHeader(entry)) continue;
    if (
      (!isTranslated(entry) && !visitsEmpty) ||
      (entry.fuzzy && !options.checkFuzzy && !ruleSet.has("fuzzy")) ||
      (entry.noqa && !options.checkNoqa) ||
      (entry.obsolete && !options.checkObsolete && !ruleSet.has("obsolete"))
    ) {
      continue;
    }
    checked++;

    for (const { rule, severity } of ruleSet.rules) {
      if (entry.noqaRules.includes(rule.id)) continue;
      guarded(rule, entry.msgid.line, () => checkEntry(rule, severity, entry, ctx, path));
    }
  }

  log.debug(
    { path, rules: ruleSet.rules.length, entries: checked, findings: diagnostics.length },
    "Catalog linted"
  );
  return diagnostics;
}

function checkEntry(
  rule: Rule,
  severity: Severity,
  entry: Entry,
  ctx: RuleContext,
  path: string
): Diagnostic[] {
  const found: Diagnostic[] = [];
  const base = { path, ruleId: rule.id, severity };

  if (rule.checkEntry) {
    const lines = fieldLines(entry);
    for (const finding of rule.checkEntry(entry, ctx)) {
      found.push({ ...base, message: finding.message, line: entry.msgid.line, highlights: [], lines });
    }
  }

  if (rule.checkCtxt && entry.msgctxt) {
    const ctxt = entry.msgctxt;
    for (const finding of rule.checkCtxt(entry, ctxt.value, ctx)) {
      const lines: ContextLine[] = [{ line: ctxt.line, field: "msgctxt", text: ctxt.value }];
      found.push(
        withLocation(entry, {
          ...base,
          message: finding.message,
          line: ctxt.line,
          highlights: normalizeHighlights(toHighlights("msgctxt", finding.highlights), lines),
          lines,
        })
      );
    }
  }

  const checkMsg = rule.checkMsg;
  if (checkMsg) {
    const visit = (idField: FieldName, id: Message, index: number, str: Message) => {
      if (str.value === "" && !rule.visitsEmptyTranslations) return;
      const strField = msgstrField(index);
      const lines: ContextLine[] = [
        { line: id.line, field: idField, text: id.value },
        { line: 0, field: null, text: "" },
        { line: str.line, field: strField, text: str.value },
      ];
      for (const finding of checkMsg(entry, id.value, str.value, ctx)) {
        const highlights = [
          ...toHighlights(idField, finding.source),
          ...toHighlights(strField, finding.translation),
        ];
        found.push(
          withLocation(entry, {
            ...base,
            message: finding.message,
            line: id.line,
            highlights: normalizeHighlights(highlights, lines),
            lines,
          })
        );
      }
    };

    const first = entry.msgstr.get(0);
    if (first) visit("msgid", entry.msgid, 0, first);
    const plural = entry.msgidPlural;
    if (plural) {
      for (const [index, str] of entry.msgstr) {
        if (index > 0) visit("msgid_plural", plural, index, str);
      }
    }
  }

  return found;
}

function toHighlights(field: FieldName, spans: readonly Span[]): Highlight[] {
  return spans.map(([start, end]) => ({ field, start, end }));
}

function withLocation(entry: Entry, diagnostic: Diagnostic): Diagnostic {
  const first = diagnostic.highlights[0];
  if (!first) return diagnostic;
  const msg = getField(entry, first.field);
  const location = msg ? locateOffset(msg, first.start) : null;
  return location ? { ...diagnostic, location } : diagnostic;
}
