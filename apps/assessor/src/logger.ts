import pino, { type Logger } from "pino";

export type { Logger };

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(x: string): x is LogLevel {
  const known: ReadonlyArray<string> = LOG_LEVELS;
  return known.includes(x);
}

/**
 * Process-wide logger. Built once by the CLI and handed to every component that logs;
 * nothing reaches for a global.
 *
 * Logs go to stderr (fd 2) so stdout carries only the result document.
 */
export function createLogger(opts: { level: LogLevel; fd?: number }): Logger {
  return pino(
    {
      level: opts.level,
      base: { app: "floodrisk" },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(opts.fd ?? 2)
  );
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
