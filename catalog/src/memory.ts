/**
 * pkgdex Catalog — In-Memory Catalog
 *
 * Indexes a list of package records by name and by tag. The directory
 * loader builds one of these; tests and embedders can build one directly.
 */

import { CatalogLoadError, CatalogLookupError } from "./errors";
import type { PackageCatalog, PackageRecord } from "./types";

export class MemoryCatalog implements PackageCatalog {
  private readonly packages = new Map<string, PackageRecord>();
  private readonly tagIndex = new Map<string, Set<string>>();

  constructor(records: Iterable<PackageRecord>) {
    for (const record of records) {
      if (this.packages.has(record.name)) {
        throw new CatalogLoadError(`Duplicate package name "${record.name}"`);
      }
      this.packages.set(record.name, record);

      for (const tag of record.tags) {
        let names = this.tagIndex.get(tag);
        if (!names) {
          names = new Set();
          this.tagIndex.set(tag, names);
        }
        names.add(record.name);
      }
    }
  }

  get size(): number {
    return this.packages.size;
  }

  allNames(): Set<string> {
    return new Set(this.packages.keys());
  }

  get(name: string): PackageRecord {
    const record = this.packages.get(name);
    if (!record) throw new CatalogLookupError(name);
    return record;
  }

  has(name: string): boolean {
    return this.packages.has(name);
  }

  packagesWithTags(tags: Iterable<string>): Set<string> {
    const result = new Set<string>();
    for (const tag of tags) {
      for (const name of this.tagIndex.get(tag) ?? []) {
        result.add(name);
      }
    }
    return result;
  }
}
