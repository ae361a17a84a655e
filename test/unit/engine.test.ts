import { describe, it, expect } from "vitest";
import { lintCatalog, type LintOptions } from "../../src/rules/engine.js";
import { createRegistry } from "../../src/rules/registry.js";
import { resolveRuleSet, resolveSelection } from "../../src/rules/selection.js";
import { blank } from "../../src/rules/builtin/blank.js";
import type { Rule } from "../../src/rules/types.js";
import type { Diagnostic } from "../../src/diagnostics/types.js";
import { createWordListDictionary } from "../../src/spelling/dictionary.js";
import { parseCatalog } from "../../src/po/parser.js";
import { BROKEN_PO, FR_HEADER, bytes, catalogFrom } from "../fixtures/sample-catalogs.js";

const PATH = "fr.po";

function lint(lines: string[], select?: string[], options: Partial<LintOptions> = {}): Diagnostic[] {
  return lintCatalog(catalogFrom(lines), resolveRuleSet({ select }), { path: PATH, ...options });
}

const ruleIds = (diagnostics: Diagnostic[]) => diagnostics.map((d) => d.ruleId);

const BLANK_ENTRY = ['msgid "Hello"', 'msgstr " "'];

describe("lintCatalog", () => {
  it("reports unbalanced brackets with highlights on the source", () => {
    const diagnostics = lint(
      [...FR_HEADER, "", 'msgid "Test [filename]"', 'msgstr "Test nom de fichier"'],
      ["brackets"]
    );

    expect(diagnostics).toEqual([
      {
        path: PATH,
        ruleId: "brackets",
        severity: "info",
        message: "missing opening and closing square brackets '[' (1 / 0) and ']' (1 / 0)",
        line: 7,
        location: { line: 7, column: 12 },
        highlights: [
          { field: "msgid", start: 5, end: 6 },
          { field: "msgid", start: 14, end: 15 },
        ],
        lines: [
          { line: 7, field: "msgid", text: "Test [filename]" },
          { line: 0, field: null, text: "" },
          { line: 8, field: "msgstr[0]", text: "Test nom de fichier" },
        ],
      },
    ]);
  });

  it("reports reordered printf arguments as the only error", () => {
    const diagnostics = lint([
      ...FR_HEADER,
      "",
      "#, c-format",
      'msgid "%d files in %s"',
      'msgstr "%s : %d fichiers"',
    ]);

    expect(diagnostics.map((d) => [d.ruleId, d.severity])).toEqual([["c-formats", "error"]]);
    expect(diagnostics[0].highlights).toEqual([
      { field: "msgid", start: 0, end: 2 },
      { field: "msgid", start: 12, end: 14 },
      { field: "msgstr[0]", start: 0, end: 2 },
      { field: "msgstr[0]", start: 5, end: 7 },
    ]);
  });

  it("reports one missing pair of square brackets", () => {
    const diagnostics = lint(
      [...FR_HEADER, "", 'msgid "Test [brackets]"', 'msgstr "Test brackets"'],
      ["brackets"]
    );

    expect(diagnostics.map((d) => [d.message, d.highlights])).toEqual([
      [
        "missing opening and closing square brackets '[' (1 / 0) and ']' (1 / 0)",
        [
          { field: "msgid", start: 5, end: 6 },
          { field: "msgid", start: 14, end: 15 },
        ],
      ],
    ]);
  });

  it("reports a type mismatch between reordered printf arguments", () => {
    const diagnostics = lint(
      [...FR_HEADER, "", "#, c-format", 'msgid "Name: %s, age: %d"', 'msgstr "Âge : %2$d, nom : %1$f"'],
      ["c-formats"]
    );

    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].severity).toBe("error");
    expect(diagnostics[0].message).toBe("inconsistent C format strings");
    expect(diagnostics[0].highlights).toEqual([
      { field: "msgid", start: 6, end: 8 },
      { field: "msgid", start: 15, end: 17 },
      { field: "msgstr[0]", start: 6, end: 10 },
      { field: "msgstr[0]", start: 18, end: 22 },
    ]);
  });

  it("does not compare printf arguments once no-c-format follows c-format", () => {
    const diagnostics = lint(
      [...FR_HEADER, "", "#, c-format", "#, no-c-format", 'msgid "%d files"', 'msgstr "fichiers"'],
      ["c-formats"]
    );
    expect(diagnostics).toEqual([]);
  });

  it("handles a lone percent sign at the end of a c-format string", () => {
    const diagnostics = lint([...FR_HEADER, "", "#, c-format", 'msgid "100%"', 'msgstr "100 %"']);
    expect(diagnostics).toEqual([]);
  });

  it("puts syntax errors first", () => {
    const diagnostics = lintCatalog(parseCatalog(bytes(BROKEN_PO)), resolveRuleSet(), { path: PATH });

    expect(ruleIds(diagnostics.slice(0, 6))).toEqual(Array(6).fill("syntax-error"));
    expect(diagnostics[0]).toEqual({
      path: PATH,
      ruleId: "syntax-error",
      severity: "error",
      message: "unterminated string",
      line: 2,
      highlights: [],
      lines: [{ line: 2, field: null, text: 'msgstr "b' }],
    });
    expect(diagnostics.slice(6).every((d) => d.ruleId !== "syntax-error")).toBe(true);
  });

  it("reports catalog findings before entry findings", () => {
    const diagnostics = lint(BLANK_ENTRY, ["blank", "spelling-str"], {
      translationDictionary: { dictionary: null, missing: "dictionary not found for language 'xx'" },
    });

    expect(ruleIds(diagnostics)).toEqual(["spelling-str", "blank"]);
    expect(diagnostics[0]).toEqual({
      path: PATH,
      ruleId: "spelling-str",
      severity: "warning",
      message: "dictionary not found for language 'xx'",
      line: 0,
      highlights: [],
      lines: [],
    });
  });

  it("does not check the header entry", () => {
    const diagnostics = lint(['msgid ""', 'msgstr " "'], ["all"]);
    expect(diagnostics).toEqual([]);
  });

  it("locates the first highlight in the file", () => {
    const [diagnostic] = lint(BLANK_ENTRY, ["blank"]);
    expect(diagnostic.line).toBe(1);
    expect(diagnostic.location).toEqual({ line: 2, column: 8 });
    expect(diagnostic.highlights).toEqual([{ field: "msgstr[0]", start: 0, end: 1 }]);
  });

  it("checks plural translations against msgid_plural", () => {
    const diagnostics = lint(
      ['msgid "one|x"', 'msgid_plural "many|x"', 'msgstr[0] "un|x"', 'msgstr[1] "plusieurs x"'],
      ["pipes"]
    );

    expect(diagnostics).toEqual([
      {
        path: PATH,
        ruleId: "pipes",
        severity: "info",
        message: "missing pipes '|' (1 / 0)",
        line: 2,
        location: { line: 2, column: 18 },
        highlights: [{ field: "msgid_plural", start: 4, end: 5 }],
        lines: [
          { line: 2, field: "msgid_plural", text: "many|x" },
          { line: 0, field: null, text: "" },
          { line: 4, field: "msgstr[1]", text: "plusieurs x" },
        ],
      },
    ]);
  });

  it("checks the context with the source dictionary", () => {
    const diagnostics = lint(
      ['msgctxt "menu itme"', 'msgid "Open"', 'msgstr "Ouvrir"'],
      ["spelling-ctxt"],
      { sourceDictionary: { dictionary: createWordListDictionary("en_US", ["menu"]), missing: null } }
    );

    expect(diagnostics).toEqual([
      {
        path: PATH,
        ruleId: "spelling-ctxt",
        severity: "info",
        message: "misspelled words in context: itme",
        line: 1,
        location: { line: 1, column: 14 },
        highlights: [{ field: "msgctxt", start: 5, end: 9 }],
        lines: [{ line: 1, field: "msgctxt", text: "menu itme" }],
      },
    ]);
  });

  it("gives entry-level findings every field of the entry", () => {
    const diagnostics = lint(["#, fuzzy", ...BLANK_ENTRY], ["default", "fuzzy"]);

    expect(ruleIds(diagnostics)).toEqual(["blank", "fuzzy"]);
    expect(diagnostics[1]).toEqual({
      path: PATH,
      ruleId: "fuzzy",
      severity: "info",
      message: "fuzzy entry",
      line: 2,
      highlights: [],
      lines: [
        { line: 2, field: "msgid", text: "Hello" },
        { line: 3, field: "msgstr[0]", text: " " },
      ],
    });
  });

  describe("entry filtering", () => {
    it("skips untranslated entries unless a rule wants them", () => {
      const entry = ['msgid "Hello!"', 'msgstr ""'];
      expect(lint(entry)).toEqual([]);

      const diagnostics = lint(entry, ["untranslated", "blank", "punc-end"]);
      expect(diagnostics).toEqual([
        {
          path: PATH,
          ruleId: "untranslated",
          severity: "info",
          message: "untranslated message",
          line: 1,
          highlights: [],
          lines: [
            { line: 1, field: "msgid", text: "Hello!" },
            { line: 0, field: null, text: "" },
            { line: 2, field: "msgstr[0]", text: "" },
          ],
        },
      ]);
    });

    it("skips fuzzy entries unless asked", () => {
      const entry = ["#, fuzzy", ...BLANK_ENTRY];
      expect(lint(entry)).toEqual([]);
      expect(ruleIds(lint(entry, undefined, { checkFuzzy: true }))).toEqual(["blank"]);
    });

    it("skips noqa entries unless asked", () => {
      const entry = ["#, noqa", ...BLANK_ENTRY];
      expect(lint(entry)).toEqual([]);
      expect(ruleIds(lint(entry, undefined, { checkNoqa: true }))).toEqual(["blank"]);
    });

    it("skips only the rules listed after noqa:", () => {
      expect(lint(["#, noqa:blank", ...BLANK_ENTRY])).toEqual([]);
      expect(ruleIds(lint(["#, noqa:tabs;pipes", ...BLANK_ENTRY]))).toEqual(["blank"]);
    });

    it("skips obsolete entries unless asked", () => {
      const entry = ['#~ msgid "Hello"', '#~ msgstr " "'];
      expect(lint(entry)).toEqual([]);
      expect(ruleIds(lint(entry, undefined, { checkObsolete: true }))).toEqual(["blank"]);

      const diagnostics = lint(entry, ["default", "obsolete"]);
      expect(ruleIds(diagnostics)).toEqual(["blank", "obsolete"]);
      expect(diagnostics[1].lines).toEqual([
        { line: 1, field: "msgid", text: "Hello" },
        { line: 2, field: "msgstr[0]", text: " " },
      ]);
    });
  });

  describe("rule failures", () => {
    const boom: Rule = {
      id: "boom",
      name: "Boom",
      description: "Always fails",
      defaultSeverity: "error",
      defaultEnabled: true,
      groups: ["checks"],
      checkMsg() {
        throw new Error("kaput");
      },
    };

    it("turns a throwing rule into a diagnostic and keeps going", () => {
      const registry = createRegistry([boom, blank]);
      const ruleSet = resolveSelection([{ action: "select", token: "all" }], { registry });
      const diagnostics = lintCatalog(catalogFrom(BLANK_ENTRY), ruleSet, { path: PATH });

      expect(ruleIds(diagnostics)).toEqual(["rule-error", "blank"]);
      expect(diagnostics[0]).toEqual({
        path: PATH,
        ruleId: "rule-error",
        severity: "error",
        message: "rule 'boom' failed: kaput",
        line: 1,
        highlights: [],
        lines: [],
      });
    });
  });

  it("keeps every highlight inside its line", () => {
    const diagnostics = lint(
      [
        ...FR_HEADER,
        "",
        "#, c-format",
        'msgid "%s: (%d)  files\\t|"',
        'msgstr "  %d fichiers"',
      ],
      ["all"]
    );

    expect(diagnostics.length).toBeGreaterThan(0);
    for (const d of diagnostics) {
      for (const h of d.highlights) {
        const line = d.lines.find((l) => l.field === h.field);
        expect(line).toBeDefined();
        expect(h.start).toBeLessThan(h.end);
        expect(h.end).toBeLessThanOrEqual(line?.text.length ?? -1);
      }
    }
  });

  it("gives the same output for the same input", () => {
    const lines = [...FR_HEADER, "", 'msgid "A (b)."', 'msgstr "A b"', "", ...BLANK_ENTRY];
    expect(lint(lines, ["all"])).toEqual(lint(lines, ["all"]));
  });
});
