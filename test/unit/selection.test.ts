import { describe, it, expect } from "vitest";
import { expandToken, resolveRuleSet, resolveSelection } from "../../src/rules/selection.js";
import { BUILTIN_RULES, createRegistry } from "../../src/rules/registry.js";
import { blank } from "../../src/rules/builtin/blank.js";
import { UnknownRuleError } from "../../src/utils/errors.js";

const DEFAULT_IDS = [
  "blank",
  "brackets",
  "c-formats",
  "double-quotes",
  "double-spaces",
  "encoding",
  "escapes",
  "newlines",
  "pipes",
  "plurals",
  "punc-end",
  "punc-start",
  "tabs",
  "whitespace-end",
  "whitespace-start",
];

const ids = (ruleSet: ReturnType<typeof resolveRuleSet>) => ruleSet.rules.map(({ rule }) => rule.id);

describe("registry", () => {
  it("holds every builtin rule once", () => {
    expect(BUILTIN_RULES).toHaveLength(24);
    expect(new Set(BUILTIN_RULES.map((r) => r.id)).size).toBe(24);
  });

  it("rejects duplicate ids", () => {
    expect(() => createRegistry([blank, blank])).toThrow("Duplicate rule id: blank");
  });
});

describe("expandToken", () => {
  it("expands groups", () => {
    expect(expandToken("all")).toHaveLength(24);
    expect(expandToken("checks")).toHaveLength(20);
    expect(expandToken("spelling")).toEqual(["spelling-ctxt", "spelling-id", "spelling-str"]);
    expect(expandToken("default")).toEqual(DEFAULT_IDS);
  });

  it("returns null for unknown tokens", () => {
    expect(expandToken("nope")).toBeNull();
    expect(expandToken("tabs")).toEqual(["tabs"]);
  });
});

describe("resolveRuleSet", () => {
  it("starts from the default rules", () => {
    expect(ids(resolveRuleSet())).toEqual(DEFAULT_IDS);
  });

  it("selects all rules", () => {
    expect(ids(resolveRuleSet({ select: ["all"] }))).toEqual(BUILTIN_RULES.map((r) => r.id));
  });

  it("leaves status rules out of checks", () => {
    const ruleSet = resolveRuleSet({ select: ["checks"] });
    expect(ruleSet.rules).toHaveLength(20);
    expect(ruleSet.has("fuzzy")).toBe(false);
    expect(ruleSet.has("untranslated")).toBe(false);
  });

  it("applies ignore after select", () => {
    const ruleSet = resolveRuleSet({ select: ["default", "spelling"], ignore: ["spelling-ctxt"] });
    expect(ruleSet.has("spelling-id")).toBe(true);
    expect(ruleSet.has("spelling-str")).toBe(true);
    expect(ruleSet.has("spelling-ctxt")).toBe(false);
    expect(ruleSet.rules).toHaveLength(17);
  });

  it("splits comma separated tokens and ignores repeats", () => {
    expect(ids(resolveRuleSet({ select: ["blank, tabs", "blank"] }))).toEqual(["blank", "tabs"]);
  });

  it("rejects unknown rules before applying anything", () => {
    expect(() => resolveRuleSet({ select: ["nope", "blank", "bad", "nope"] })).toThrow(
      "unknown selected rules: bad, nope"
    );
    expect(() => resolveRuleSet({ ignore: ["zzz"] })).toThrow("unknown rules to ignore: zzz");
    expect(() => resolveRuleSet({ overrides: { zzz: "error" } })).toThrow(
      "unknown rules in severity overrides: zzz"
    );
  });

  it("exposes the offending tokens", () => {
    try {
      resolveRuleSet({ select: ["nope"] });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnknownRuleError);
      if (err instanceof UnknownRuleError) {
        expect(err.tokens).toEqual(["nope"]);
        expect(err.code).toBe("UNKNOWN_RULE");
      }
    }
  });

  it("applies severity overrides and filters", () => {
    const ruleSet = resolveRuleSet({ overrides: { tabs: "warning" } });
    expect(ruleSet.severityOf("tabs")).toBe("warning");
    expect(ruleSet.severityOf("blank")).toBe("warning");
    expect(ruleSet.severityOf("fuzzy")).toBeUndefined();

    expect(ids(resolveRuleSet({ severities: ["error"] }))).toEqual([
      "c-formats",
      "escapes",
      "newlines",
      "plurals",
      "tabs",
    ]);
  });

  it("returns a frozen rule set", () => {
    const ruleSet = resolveRuleSet();
    expect(Object.isFrozen(ruleSet)).toBe(true);
    expect(Object.isFrozen(ruleSet.rules)).toBe(true);
  });
});

describe("resolveSelection", () => {
  it("applies steps in the order given", () => {
    const ruleSet = resolveSelection([
      { action: "select", token: "all" },
      { action: "ignore", token: "checks" },
      { action: "select", token: "blank" },
    ]);
    expect(ids(ruleSet)).toEqual(["blank", "fuzzy", "obsolete", "unchanged", "untranslated"]);
  });

  it("lets a later select undo an ignore and the reverse", () => {
    const ruleSet = resolveSelection([
      { action: "ignore", token: "tabs" },
      { action: "select", token: "tabs" },
      { action: "select", token: "pipes" },
      { action: "ignore", token: "pipes" },
    ]);
    expect(ids(ruleSet)).toEqual(["tabs"]);
  });
});
