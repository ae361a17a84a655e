import { z } from "zod";
import { ConfigError } from "../utils/errors.js";

const envSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),

  // Config file, `.polint.yml` in the working directory otherwise
  POLINT_CONFIG: z.string().min(1).optional(),

  // Spelling
  POLINT_DICTS_PATH: z.string().min(1).optional(),
  POLINT_WORDS_PATH: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function parseEnv(raw: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const invalid = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigError(`Invalid environment variables:\n${invalid}`);
  }
  return result.data;
}

export function loadEnv(): Env {
  if (_env) return _env;
  _env = parseEnv({ ...process.env });
  return _env;
}
