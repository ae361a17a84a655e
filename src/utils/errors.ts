export type PolintErrorCode =
  | "UNKNOWN_RULE"
  | "ENCODING"
  | "PIPELINE"
  | "CONFIG";

/** Base class for every error the linter raises on its fatal channel. */
export class PolintError extends Error {
  readonly code: PolintErrorCode;

  constructor(code: PolintErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A select, ignore or severity override named a rule that does not exist. */
export class UnknownRuleError extends PolintError {
  readonly tokens: string[];

  constructor(kind: string, tokens: string[]) {
    super("UNKNOWN_RULE", `unknown ${kind}: ${tokens.join(", ")}`);
    this.tokens = tokens;
  }
}

export class EncodingError extends PolintError {
  readonly encoding: string;

  constructor(encoding: string, message?: string) {
    super("ENCODING", message ?? `unsupported encoding '${encoding}'`);
    this.encoding = encoding;
  }
}

export class PipelineError extends PolintError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("PIPELINE", message, options);
    this.path = path;
  }
}

export class ConfigError extends PolintError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG", message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
