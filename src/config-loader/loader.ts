import { readFile } from "node:fs/promises";
import yaml from "js-yaml";
import { parseConfig, type PolintConfig } from "./schema.js";
import { DEFAULT_CONFIG } from "../config/defaults.js";
import type { Env } from "../config/env.js";
import { ConfigError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "config-loader" });

export const CONFIG_FILENAME = ".polint.yml";

export interface LoadConfigOptions {
  /** Explicit config file; a missing one is an error. */
  path?: string;
  env?: Partial<Pick<Env, "POLINT_CONFIG" | "POLINT_DICTS_PATH" | "POLINT_WORDS_PATH">>;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Read the config file, validate it and apply environment overrides.
 * Without an explicit path, a missing `.polint.yml` means the defaults.
 *
 * @throws ConfigError when the file cannot be read, parsed or validated
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<PolintConfig> {
  const env = options.env ?? {};
  const explicit = options.path ?? env.POLINT_CONFIG;
  const file = explicit ?? CONFIG_FILENAME;

  let content: string | null;
  try {
    content = await readFile(file, "utf-8");
  } catch (err) {
    if (!explicit && isMissing(err)) {
      log.debug({ file }, "No config file found, using defaults");
      content = null;
    } else {
      throw new ConfigError(`cannot read config file '${file}'`, { cause: err });
    }
  }

  let config = DEFAULT_CONFIG;
  if (content !== null) {
    let raw: unknown;
    try {
      raw = yaml.load(content);
    } catch (err) {
      throw new ConfigError(`invalid YAML in '${file}'`, { cause: err });
    }
    config = parseConfig(raw, `config file '${file}'`);
    log.debug({ file }, "Config file loaded");
  }

  return applyEnv(config, env);
}

export function applyEnv(config: PolintConfig, env: LoadConfigOptions["env"] = {}): PolintConfig {
  if (!env.POLINT_DICTS_PATH && !env.POLINT_WORDS_PATH) return config;
  return {
    ...config,
    spelling: {
      ...config.spelling,
      dictsPath: env.POLINT_DICTS_PATH ?? config.spelling.dictsPath,
      wordsPath: env.POLINT_WORDS_PATH ?? config.spelling.wordsPath,
    },
  };
}
