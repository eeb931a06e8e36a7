/**
 * pkgdex Engine — Errors
 */

import { PkgdexError } from "@pkgdex/catalog";

/** A filter pattern could not be compiled. */
export class PatternError extends PkgdexError {
  readonly pattern: string;

  constructor(pattern: string, reason: string) {
    super("PATTERN_ERROR", `Invalid pattern "${pattern}": ${reason}`);
    this.pattern = pattern;
  }
}

/** The requested output format has no registered formatter. */
export class MissingFormatterError extends PkgdexError {
  readonly format: string;

  constructor(format: string, available: readonly string[]) {
    super(
      "MISSING_FORMATTER",
      `Unknown format "${format}" (available: ${available.join(", ")})`,
    );
    this.format = format;
  }
}
