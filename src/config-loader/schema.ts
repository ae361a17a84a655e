import { z } from "zod";
import { ConfigError } from "../utils/errors.js";

const severity = z.enum(["error", "warning", "info"]);

/** `"blank, tabs"` or `["blank", "tabs"]`. */
const ruleList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (typeof value === "string" ? [value] : value));

const configSchema = z
  .object({
    select: ruleList.default([]),
    ignore: ruleList.default([]),
    severities: z.array(severity).min(1).default(["error", "warning", "info"]),
    overrides: z.record(z.string(), severity).default({}),
    checkFuzzy: z.boolean().default(false),
    checkNoqa: z.boolean().default(false),
    checkObsolete: z.boolean().default(false),
    spelling: z
      .object({
        dictsPath: z.string().min(1).default("/usr/share/hunspell"),
        wordsPath: z.string().min(1).nullable().default(null),
        sourceLanguage: z.string().min(1).default("en_US"),
      })
      .strict()
      .default({}),
    concurrency: z.number().int().positive().optional(),
    encoding: z.string().min(1).optional(),
    output: z.enum(["text", "json", "misspelled"]).default("text"),
    sort: z.enum(["line", "message", "rule"]).default("line"),
    ruleCounts: z.boolean().default(false),
    fileCounts: z.boolean().default(false),
    statistics: z
      .object({
        enabled: z.boolean().default(false),
        sort: z.enum(["path", "status"]).default("path"),
        words: z.boolean().default(false),
      })
      .strict()
      .default({}),
  })
  .strict();

export type PolintConfig = z.infer<typeof configSchema>;

/** @throws ConfigError listing every invalid key */
export function parseConfig(raw: unknown, source = "config"): PolintConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const invalid = result.error.issues
      .map((i) => `  ${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid ${source}:\n${invalid}`);
  }
  return result.data;
}
