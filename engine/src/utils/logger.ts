/**
 * pkgdex Engine — Structured Logger
 *
 * pino logger for diagnostics. Reports go to stdout, so logs always go
 * to stderr (or an explicit destination) and never mix into a report.
 *
 * Silent unless a level is requested; the CLI turns on "debug" with --debug.
 */

import pino from "pino";

export const LOG_LEVELS = ["silent", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level: LogLevel;
  /** Where log lines go; defaults to stderr, written synchronously */
  destination?: pino.DestinationStream;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
};

export function createLogger(options: Partial<LoggerOptions> = {}): Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pino(
    {
      name: "pkgdex",
      level: opts.level,
      base: undefined,
      formatters: {
        level(label: string) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    opts.destination ?? pino.destination({ fd: 2, sync: true }),
  );
}

export type Logger = pino.Logger;
