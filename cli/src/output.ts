/**
 * pkgdex CLI — Output Helpers
 *
 * Colors and status messages for everything that is not the report.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors.
 *
 * stdout belongs to the report, which may be piped into a file or
 * another tool, so every message here goes to stderr.
 */

import chalk from "chalk";

// ─── Debug Mode ─────────────────────────────────────────────

let _debugMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

export function isDebugMode(): boolean {
  return _debugMode;
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  error: chalk.red,
  muted: chalk.gray,
  pkg: chalk.bold.white,
};

// ─── Symbols (safe for Windows terminals) ───────────────────

export const symbols = {
  error: chalk.red("\u2716"), // ✖
  warn: chalk.yellow("\u26A0"), // ⚠
};

// ─── Print Helpers ──────────────────────────────────────────

export function printError(msg: string): void {
  console.error(`${symbols.error} ${colors.error(msg)}`);
}

export function printWarn(msg: string): void {
  console.error(`${symbols.warn}  ${msg}`);
}

/**
 * Print a debug message. Only visible with --debug flag.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.error(colors.muted(`  [debug] ${msg}`));
  }
}
