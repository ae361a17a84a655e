import type { Severity } from "../diagnostics/types.js";
import { UnknownRuleError } from "../utils/errors.js";
import { REGISTRY, type RuleRegistry } from "./registry.js";
import type { Rule } from "./types.js";

export const RULE_GROUPS = ["all", "checks", "spelling", "default"] as const;

export interface SelectionStep {
  action: "select" | "ignore";
  /** Rule id or group name. */
  token: string;
}

export interface EnabledRule {
  rule: Rule;
  severity: Severity;
}

/** The rules a run will execute, frozen, in registration order. */
export interface RuleSet {
  readonly rules: readonly EnabledRule[];
  readonly ids: ReadonlySet<string>;
  has(id: string): boolean;
  severityOf(id: string): Severity | undefined;
}

export interface ResolveOptions {
  /** Keep only rules whose effective severity is listed. */
  severities?: readonly Severity[];
  /** Effective severity per rule id. */
  overrides?: Readonly<Record<string, Severity>>;
  registry?: RuleRegistry;
}

export interface SelectionOptions extends ResolveOptions {
  select?: readonly string[];
  ignore?: readonly string[];
}

/** Rule ids a token stands for, or null when it names nothing. */
export function expandToken(token: string, registry: RuleRegistry = REGISTRY): string[] | null {
  const ids = (filter: (rule: Rule) => boolean) =>
    registry.rules.filter(filter).map((rule) => rule.id);

  switch (token) {
    case "all":
      return ids(() => true);
    case "checks":
      return ids((rule) => rule.groups.includes("checks"));
    case "spelling":
      return ids((rule) => rule.groups.includes("spelling"));
    case "default":
      return ids((rule) => rule.defaultEnabled);
    default:
      return registry.has(token) ? [token] : null;
  }
}

/** Split `"blank, tabs"` style lists and drop empty tokens. */
export function splitTokens(tokens: readonly string[]): string[] {
  return tokens
    .flatMap((token) => token.split(","))
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

function unknownTokens(tokens: string[], registry: RuleRegistry): string[] {
  const unknown = tokens.filter((token) => expandToken(token, registry) === null);
  return [...new Set(unknown)].sort();
}

/**
 * Apply select/ignore steps strictly in order to an empty set: a select adds
 * the rules of its token, an ignore removes them.
 *
 * @throws UnknownRuleError before anything is applied
 */
export function resolveSelection(
  steps: readonly SelectionStep[],
  options: ResolveOptions = {}
): RuleSet {
  const registry = options.registry ?? REGISTRY;

  const selected = unknownTokens(
    steps.filter((s) => s.action === "select").map((s) => s.token),
    registry
  );
  if (selected.length > 0) throw new UnknownRuleError("selected rules", selected);
  const ignored = unknownTokens(
    steps.filter((s) => s.action === "ignore").map((s) => s.token),
    registry
  );
  if (ignored.length > 0) throw new UnknownRuleError("rules to ignore", ignored);

  const overrides = options.overrides ?? {};
  const badOverrides = Object.keys(overrides)
    .filter((id) => !registry.has(id))
    .sort();
  if (badOverrides.length > 0) {
    throw new UnknownRuleError("rules in severity overrides", badOverrides);
  }

  const working = new Set<string>();
  for (const step of steps) {
    for (const id of expandToken(step.token, registry) ?? []) {
      if (step.action === "select") working.add(id);
      else working.delete(id);
    }
  }

  const severities = options.severities && options.severities.length > 0 ? options.severities : null;
  const rules: EnabledRule[] = [];
  for (const rule of registry.rules) {
    if (!working.has(rule.id)) continue;
    const severity = overrides[rule.id] ?? rule.defaultSeverity;
    if (severities && !severities.includes(severity)) continue;
    rules.push(Object.freeze({ rule, severity }));
  }

  return createRuleSet(rules);
}

/**
 * Select tokens apply first, then ignore tokens. Without select tokens the
 * default rules are the starting point.
 */
export function resolveRuleSet(options: SelectionOptions = {}): RuleSet {
  const select = splitTokens(options.select ?? []);
  const ignore = splitTokens(options.ignore ?? []);
  const steps: SelectionStep[] = [
    ...(select.length > 0 ? select : ["default"]).map((token) => ({
      action: "select" as const,
      token,
    })),
    ...ignore.map((token) => ({ action: "ignore" as const, token })),
  ];
  return resolveSelection(steps, options);
}

function createRuleSet(rules: EnabledRule[]): RuleSet {
  const bySeverity = new Map(rules.map(({ rule, severity }) => [rule.id, severity]));
  const ids: ReadonlySet<string> = new Set(bySeverity.keys());
  return Object.freeze({
    rules: Object.freeze(rules),
    ids,
    has: (id: string) => bySeverity.has(id),
    severityOf: (id: string) => bySeverity.get(id),
  });
}
