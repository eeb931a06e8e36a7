/**
 * pkgdex Catalog — Core Type Definitions
 *
 * The package model shared by the catalog loader and the report engine.
 * Everything here is a read-only view: nothing in pkgdex mutates a
 * package once the catalog has been built.
 */

// ─── Dependency Types ────────────────────────────────────────────

/**
 * Dependency categories in report order. Reports iterate this list,
 * so the order here is the order sections appear in.
 */
export const ALL_DEPENDENCY_TYPES = ["build", "link", "run", "test"] as const;

export type DependencyType = (typeof ALL_DEPENDENCY_TYPES)[number];

export type DependencyMap = Partial<Record<DependencyType, readonly string[]>>;

// ─── Package ─────────────────────────────────────────────────────

export interface PackageRecord {
  /** Unique package name, the catalog's primary key */
  name: string;
  /** Project homepage URL (may be empty) */
  homepage: string;
  /** Free-form description text (may be empty) */
  description: string;
  /** Known version strings, in no particular order */
  versions: readonly string[];
  /** Dependency names keyed by dependency type */
  dependencies: DependencyMap;
  /** Classification labels */
  tags: readonly string[];
}

// ─── Catalog Contract ────────────────────────────────────────────

export interface PackageCatalog {
  /** Number of packages in the catalog */
  readonly size: number;
  allNames(): Set<string>;
  /**
   * Look up a package by exact name.
   * @throws CatalogLookupError when the name is not in the catalog
   */
  get(name: string): PackageRecord;
  has(name: string): boolean;
  /** Names of packages carrying any of the given tags. */
  packagesWithTags(tags: Iterable<string>): Set<string>;
}

/** A package file the loader could not read. */
export interface CatalogProblem {
  name: string;
  file: string;
  message: string;
}
