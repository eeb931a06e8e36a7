/**
 * pkgdex Engine — Source Links
 *
 * Builds the URL of a package's source file from a template such as
 * "https://example.org/catalog/packages/{name}/package.yaml".
 */

import type { PackageRecord } from "@pkgdex/catalog";

export type SourceLinker = (pkg: Pick<PackageRecord, "name">) => string;

export const DEFAULT_SOURCE_URL =
  "https://example.org/pkgdex/catalog/packages/{name}/package.yaml";

export function createSourceLinker(template: string = DEFAULT_SOURCE_URL): SourceLinker {
  return (pkg) => template.split("{name}").join(encodeURIComponent(pkg.name));
}
