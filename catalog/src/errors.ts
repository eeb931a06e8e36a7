/**
 * pkgdex Catalog — Errors
 *
 * Every error pkgdex raises carries a category so the CLI can report it
 * without inspecting messages.
 */

export type ErrorCategory =
  | "PATTERN_ERROR"
  | "MISSING_FORMATTER"
  | "CATALOG_LOOKUP"
  | "CATALOG_LOAD";

export class PkgdexError extends Error {
  readonly category: ErrorCategory;

  constructor(category: ErrorCategory, message: string) {
    super(message);
    this.name = new.target.name;
    this.category = category;
  }
}

/** A name was requested that the catalog does not contain. */
export class CatalogLookupError extends PkgdexError {
  readonly packageName: string;

  constructor(packageName: string) {
    super("CATALOG_LOOKUP", `Package "${packageName}" is not in the catalog`);
    this.packageName = packageName;
  }
}

/** The catalog could not be built from its source. */
export class CatalogLoadError extends PkgdexError {
  constructor(message: string) {
    super("CATALOG_LOAD", message);
  }
}
