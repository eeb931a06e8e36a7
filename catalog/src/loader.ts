/**
 * pkgdex Catalog — Directory Loader
 *
 * Loads the package catalog stored on disk.
 *
 * Catalog structure:
 *   <catalog_dir>/
 *     packages/
 *       <name>/
 *         package.yaml
 *
 * The loader builds an in-memory index on first access. Package files
 * that cannot be read are left out of the index and reported through
 * `problems` so the caller decides how loudly to complain.
 */

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { CatalogLoadError } from "./errors";
import { MemoryCatalog } from "./memory";
import { ALL_DEPENDENCY_TYPES } from "./types";
import type {
  CatalogProblem,
  PackageCatalog,
  PackageRecord,
} from "./types";

const PACKAGE_FILE = "package.yaml";

const NameList = z
  .array(z.string().min(1))
  .nullish()
  .transform((v) => v ?? []);

const OptionalText = z
  .string()
  .nullish()
  .transform((v) => (v ?? "").trim());

/** Shape of a package.yaml file. Unknown keys are ignored. */
const PackageFileSchema = z.object({
  name: z.string().min(1).optional(),
  homepage: OptionalText,
  description: OptionalText,
  versions: NameList,
  dependencies: z
    .object({
      build: NameList,
      link: NameList,
      run: NameList,
      test: NameList,
    })
    .strict()
    .nullish()
    .transform((v) => v ?? { build: [], link: [], run: [], test: [] }),
  tags: NameList,
});

/**
 * Parse the text of a package.yaml into a record.
 *
 * Scalars are read with the YAML failsafe schema, so "1.10" stays a
 * string instead of becoming the number 1.1.
 *
 * @param fallbackName - used when the file does not set `name`
 */
export function parsePackageFile(content: string, fallbackName: string): PackageRecord {
  const raw: unknown = parseYaml(content, { schema: "failsafe" });
  const file = PackageFileSchema.parse(raw ?? {});

  const dependencies: PackageRecord["dependencies"] = {};
  for (const type of ALL_DEPENDENCY_TYPES) {
    const names = file.dependencies[type];
    if (names.length > 0) dependencies[type] = names;
  }

  return {
    name: file.name ?? fallbackName,
    homepage: file.homepage,
    description: file.description,
    versions: file.versions,
    dependencies,
    tags: file.tags,
  };
}

function describeError(err: unknown): string {
  if (err instanceof z.ZodError) {
    return err.issues
      .map((issue) => `${issue.path.join(".") || "/"}: ${issue.message}`)
      .join("; ");
  }
  return err instanceof Error ? err.message : String(err);
}

export class Catalog implements PackageCatalog {
  private readonly catalogDir: string;
  private index: MemoryCatalog | null = null;
  private _problems: CatalogProblem[] = [];

  constructor(catalogDir: string) {
    this.catalogDir = catalogDir;
  }

  /**
   * Get the packages directory path.
   */
  get packagesDir(): string {
    return path.join(this.catalogDir, "packages");
  }

  /**
   * Package files skipped while building the index.
   */
  get problems(): readonly CatalogProblem[] {
    this.getIndex();
    return this._problems;
  }

  get size(): number {
    return this.getIndex().size;
  }

  allNames(): Set<string> {
    return this.getIndex().allNames();
  }

  get(name: string): PackageRecord {
    return this.getIndex().get(name);
  }

  has(name: string): boolean {
    return this.getIndex().has(name);
  }

  packagesWithTags(tags: Iterable<string>): Set<string> {
    return this.getIndex().packagesWithTags(tags);
  }

  /**
   * Force-rebuild the index.
   */
  refresh(): void {
    this.index = null;
    this.getIndex();
  }

  // ─── Private ────────────────────────────────────────────────

  private getIndex(): MemoryCatalog {
    if (this.index) return this.index;
    this.index = this.buildIndex();
    return this.index;
  }

  /**
   * Scan the packages directory and build the index.
   */
  private buildIndex(): MemoryCatalog {
    if (!fs.existsSync(this.catalogDir)) {
      throw new CatalogLoadError(`Catalog directory not found: ${this.catalogDir}`);
    }

    const records: PackageRecord[] = [];
    this._problems = [];

    if (!fs.existsSync(this.packagesDir)) return new MemoryCatalog(records);

    const dirs = fs
      .readdirSync(this.packagesDir, { withFileTypes: true })
      .filter((d: fs.Dirent) => d.isDirectory())
      .map((d: fs.Dirent) => d.name)
      .sort();

    for (const dir of dirs) {
      const file = path.join(this.packagesDir, dir, PACKAGE_FILE);
      if (!fs.existsSync(file)) continue;

      try {
        const content = fs.readFileSync(file, "utf-8");
        records.push(parsePackageFile(content, dir));
      } catch (err) {
        this._problems.push({ name: dir, file, message: describeError(err) });
      }
    }

    return new MemoryCatalog(records);
  }
}
