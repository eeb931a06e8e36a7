/**
 * pkgdex Catalog — Public API
 *
 * Main entry point for the catalog package.
 * Exports the package model, the catalog implementations, and version ordering.
 */

export { Catalog, parsePackageFile } from "./loader";
export { MemoryCatalog } from "./memory";
export { ALL_DEPENDENCY_TYPES } from "./types";
export type {
  CatalogProblem,
  DependencyMap,
  DependencyType,
  PackageCatalog,
  PackageRecord,
} from "./types";
export { compareVersions, parseVersion, sortVersionsDescending } from "./version";
export {
  CatalogLoadError,
  CatalogLookupError,
  PkgdexError,
} from "./errors";
export type { ErrorCategory } from "./errors";
