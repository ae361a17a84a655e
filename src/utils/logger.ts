import pino from "pino";

let _logger: pino.Logger | null = null;

/** Process-wide logger. Writes to stderr so stdout stays free for reports. */
export function getLogger(): pino.Logger {
  if (_logger) return _logger;

  _logger = pino(
    {
      name: "polint",
      level: process.env.LOG_LEVEL ?? "warn",
    },
    pino.destination(2)
  );

  return _logger;
}

export function createChildLogger(bindings: Record<string, unknown>): pino.Logger {
  return getLogger().child(bindings);
}
