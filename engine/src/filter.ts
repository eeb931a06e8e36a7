/**
 * pkgdex Engine — Catalog Filter
 *
 * Narrows the catalog to the names a report should cover.
 *
 * A name is kept when any pattern matches it or, with description
 * search enabled, when any pattern matches the package description.
 * The same pattern does not have to match both.
 */

import type { PackageCatalog } from "@pkgdex/catalog";
import { compilePattern, type PatternMatcher } from "./pattern";

export interface FilterSpec {
  /** Glob patterns; empty keeps every package */
  patterns: readonly string[];
  /** Also match patterns against package descriptions */
  searchDescription: boolean;
  /** Keep only packages carrying any of these tags; empty disables */
  tags: readonly string[];
}

export const EMPTY_FILTER: FilterSpec = {
  patterns: [],
  searchDescription: false,
  tags: [],
};

/**
 * Case-insensitive name order. Names differing only in case fall back to
 * code-unit order so sorting never depends on input order.
 */
export function compareNames(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la !== lb) return la < lb ? -1 : 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Deduplicate and sort names case-insensitively.
 */
export function sortNames(names: Iterable<string>): string[] {
  return [...new Set(names)].sort(compareNames);
}

function matchesAny(
  catalog: PackageCatalog,
  name: string,
  matchers: readonly PatternMatcher[],
  searchDescription: boolean,
): boolean {
  if (matchers.some((m) => m.matches(name))) return true;
  if (!searchDescription) return false;

  const { description } = catalog.get(name);
  if (!description) return false;
  return matchers.some((m) => m.matches(description));
}

/**
 * Filter the catalog by name patterns, description and tags.
 *
 * @returns sorted, duplicate-free package names
 * @throws PatternError when a pattern cannot be compiled
 */
export function filterPackages(
  catalog: PackageCatalog,
  spec: FilterSpec,
  names: Iterable<string> = catalog.allNames(),
): string[] {
  let retained: string[];

  if (spec.patterns.length === 0) {
    retained = [...names];
  } else {
    const matchers = spec.patterns.map(compilePattern);
    retained = [...names].filter((name) =>
      matchesAny(catalog, name, matchers, spec.searchDescription),
    );
  }

  let sorted = sortNames(retained);

  if (spec.tags.length > 0) {
    const tagged = catalog.packagesWithTags(spec.tags);
    sorted = sortNames(sorted.filter((name) => tagged.has(name)));
  }

  return sorted;
}
