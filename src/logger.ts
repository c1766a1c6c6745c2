import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger };

export interface CreateLoggerOpts {
  level?: string;
  /** Extra bindings attached to every line. */
  bindings?: Record<string, unknown>;
  /** Write to stderr, keeping stdout for command output. */
  stderr?: boolean;
}

/**
 * Root logger for a process. Level comes from opts, then LOG_LEVEL, then "info".
 */
export function createLogger(name: string, opts: CreateLoggerOpts = {}): Logger {
  const options: LoggerOptions = {
    name,
    level: opts.level ?? process.env.LOG_LEVEL ?? "info",
    base: opts.bindings ?? {},
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return opts.stderr ? pino(options, pino.destination(2)) : pino(options);
}

/** Logger that drops everything. Used by tests and library callers without one. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
