import * as path from "node:path";
import pino, { type Logger } from "pino";

/**
 * Minimal structured logger for the whole system.
 * Do not put domain-specific logging helpers here.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: undefined
});

export type NamedLoggerOptions = {
  /** When set, the logger also appends to `<logDir>/<name>.log`. */
  logDir?: string;
  bindings?: Record<string, unknown>;
};

const registry = new Map<string, Logger>();

/**
 * Returns the logger registered under `name`, creating it on first use.
 * Later calls with the same name return the first instance and ignore
 * their options, so a handler is never attached twice.
 */
export function getNamedLogger(name: string, options: NamedLoggerOptions = {}): Logger {
  const existing = registry.get(name);
  if (existing) {
    return existing;
  }

  const bindings = options.bindings ?? {};
  let created: Logger;
  if (options.logDir) {
    const logPath = path.join(options.logDir, `${name}.log`);
    created = pino(
      { level: logger.level, base: undefined },
      pino.multistream([
        { level: logger.level, stream: process.stdout },
        { level: logger.level, stream: pino.destination({ dest: logPath, mkdir: true, sync: false }) }
      ])
    ).child(bindings);
    created.info({ log_path: logPath }, "logger initialized");
  } else {
    created = logger.child(bindings);
  }

  registry.set(name, created);
  return created;
}

export function hasNamedLogger(name: string): boolean {
  return registry.has(name);
}
