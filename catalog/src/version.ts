/**
 * pkgdex Catalog — Version Ordering
 *
 * Numeric-aware ordering for package version strings.
 * Handles the shapes seen in real catalogs: dotted releases ("1.1.5"),
 * suffixed releases ("2.0rc1", "0.7-beta"), and branch names ("master").
 */

/** Branch-style versions that sort above every numbered release. */
const BRANCH_VERSIONS = new Set(["develop", "main", "master", "head", "trunk"]);

type VersionComponent = number | string;

/**
 * Split a version into numeric and alphabetic components.
 *
 * Examples:
 *   "1.1.5"    → [1, 1, 5]
 *   "2.0rc1"   → [2, 0, "rc", 1]
 *   "0.7-beta" → [0, 7, "beta"]
 */
export function parseVersion(version: string): VersionComponent[] {
  const tokens = version.trim().match(/[0-9]+|[A-Za-z]+/g) ?? [];
  return tokens.map((t) => (/^[0-9]/.test(t) ? parseInt(t, 10) : t));
}

function isBranch(version: string): boolean {
  return BRANCH_VERSIONS.has(version.trim().toLowerCase());
}

function compareComponent(a: VersionComponent, b: VersionComponent): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  // A number outranks a word in the same position: 1.0 > 1.rc
  if (typeof a === "number") return 1;
  if (typeof b === "number") return -1;
  return a < b ? -1 : a > b ? 1 : 0;
}

function sign(n: number): -1 | 0 | 1 {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

/**
 * Compare two version strings.
 *
 * Returns -1 if a is older than b, 0 if they are the same string, 1 if
 * a is newer. Distinct strings never compare equal, so the ordering is
 * total and sorting is deterministic.
 */
export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  if (a === b) return 0;

  const aBranch = isBranch(a);
  const bBranch = isBranch(b);
  if (aBranch !== bBranch) return aBranch ? 1 : -1;

  if (!aBranch) {
    const pa = parseVersion(a);
    const pb = parseVersion(b);
    const shared = Math.min(pa.length, pb.length);
    for (let i = 0; i < shared; i++) {
      const cmp = compareComponent(pa[i], pb[i]);
      if (cmp !== 0) return sign(cmp);
    }
    if (pa.length !== pb.length) return pa.length > pb.length ? 1 : -1;
  }

  return a < b ? -1 : 1;
}

/**
 * Versions ordered newest first, duplicates removed.
 */
export function sortVersionsDescending(versions: Iterable<string>): string[] {
  return [...new Set(versions)].sort((a, b) => compareVersions(b, a));
}
