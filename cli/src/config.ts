/**
 * pkgdex CLI — Configuration
 *
 * Central location for CLI paths, defaults, and environment settings.
 * All pkgdex data lives under ~/.pkgdex unless PKGDEX_HOME says otherwise.
 *
 * Environment:
 *   PKGDEX_HOME        data directory (default ~/.pkgdex)
 *   PKGDEX_CATALOG     catalog directory (default $PKGDEX_HOME/catalog)
 *   PKGDEX_SOURCE_URL  source link template containing "{name}"
 *   PKGDEX_LOG_LEVEL   silent | debug | info | warn | error
 *   COLUMNS            terminal width when stdout does not report one
 */

import * as path from "path";
import * as os from "os";
import { z } from "zod";
import { DEFAULT_SOURCE_URL, DEFAULT_WIDTH, LOG_LEVELS, type LogLevel } from "@pkgdex/engine";

const EnvSchema = z.object({
  PKGDEX_HOME: z.string().optional(),
  PKGDEX_CATALOG: z.string().optional(),
  PKGDEX_SOURCE_URL: z
    .string()
    .url()
    .refine((v) => v.includes("{name}"), { message: 'must contain "{name}"' })
    .optional(),
  PKGDEX_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  COLUMNS: z.coerce.number().int().positive().optional(),
});

export interface CliConfig {
  /** Root data directory */
  home: string;
  /** Catalog directory holding packages/<name>/package.yaml */
  catalogDir: string;
  /** Source link template */
  sourceUrl: string;
  logLevel: LogLevel;
  /** Width used when stdout is not a terminal that reports its size */
  width: number;
}

export interface ConfigOverrides {
  catalog?: string;
}

/**
 * Build the CLI configuration from the environment.
 * Empty variables count as unset.
 *
 * @throws Error naming the offending variable when a setting is invalid
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): CliConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  const home = vars.PKGDEX_HOME ?? path.join(os.homedir(), ".pkgdex");

  return {
    home,
    catalogDir: path.resolve(overrides.catalog ?? vars.PKGDEX_CATALOG ?? path.join(home, "catalog")),
    sourceUrl: vars.PKGDEX_SOURCE_URL ?? DEFAULT_SOURCE_URL,
    logLevel: vars.PKGDEX_LOG_LEVEL ?? "silent",
    width: vars.COLUMNS ?? DEFAULT_WIDTH,
  };
}
