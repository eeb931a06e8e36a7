/**
 * pkgdex Engine — reStructuredText Report
 *
 * A full document: title, an index table of links, then one section per
 * package. Dependencies that are also in the report link to their own
 * section; the rest are plain text.
 */

import { ALL_DEPENDENCY_TYPES, type PackageRecord } from "@pkgdex/catalog";
import { layoutColumns, renderColumns } from "../table";
import { capitalize, describeVersions, escapeHtml, formatDescription } from "../text";
import { lineWriter, packageCountSentence, type Formatter, type PrintLine } from "./types";

/**
 * Heading underline for `title`. Never shorter than 2: a one-character
 * rule is not a valid section adornment, which would break a package
 * named "R".
 */
export function headingRule(title: string, char = "-"): string {
  return char.repeat(Math.max(title.length, 2));
}

/**
 * A simple RST table holding `items` in columns fitted to `width`.
 */
export function rstTable(items: readonly string[], width: number): string {
  const layout = layoutColumns(items, { width });
  const border = layout.columnWidths.map((w) => "=".repeat(w - 1)).join(" ");
  return [border, ...renderColumns(items, layout), border].join("\n");
}

function printPackage(
  print: PrintLine,
  pkg: PackageRecord,
  listed: ReadonlySet<string>,
  sourceLink: string,
): void {
  const rule = headingRule(pkg.name);

  print("-----");
  print();
  print(`.. _${pkg.name}:`);
  print();
  print(rule);
  print(pkg.name);
  print(rule);
  print();
  print("Homepage:");
  print(`  * \`${escapeHtml(pkg.homepage)} <${pkg.homepage}>\`__`);
  print();
  print("Source:");
  print(`  * \`${pkg.name}/package.yaml <${sourceLink}>\`__`);
  print();

  if (pkg.versions.length > 0) {
    print("Versions:");
    print(`  ${describeVersions(pkg.versions)}`);
    print();
  }

  for (const type of ALL_DEPENDENCY_TYPES) {
    const deps = pkg.dependencies[type] ?? [];
    if (deps.length === 0) continue;
    print(`${capitalize(type)} Dependencies`);
    print(`  ${deps.map((d) => (listed.has(d) ? `${d}_` : d)).join(", ")}`);
    print();
  }

  print("Description:");
  print(formatDescription(pkg.description, 2));
  print();
}

export const rst: Formatter = (names, { catalog, out, sourceLinkFor, width }) => {
  const pkgs = names.map((name) => catalog.get(name));
  const listed = new Set(names);
  const print = lineWriter(out);

  print(".. _package-list:");
  print();
  print(headingRule("Package List", "="));
  print("Package List");
  print(headingRule("Package List", "="));
  print();
  print("This is a list of things you can install using pkgdex.  It is");
  print("automatically generated based on the packages in the catalog.");
  print();
  print(packageCountSentence(pkgs.length));
  print();
  print(rstTable(names.map((name) => `\`${name}\`_`), width));
  print();

  for (const pkg of pkgs) {
    printPackage(print, pkg, listed, sourceLinkFor(pkg));
  }
};
