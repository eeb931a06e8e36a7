/**
 * pkgdex Engine — HTML Report
 *
 * An HTML fragment meant to be inlined into a Sphinx-built page, so it
 * uses docutils class names and has no <html> or <body> of its own.
 * Rendering HTML directly is much faster for Sphinx than the RST report
 * when the catalog is large.
 */

import { ALL_DEPENDENCY_TYPES, type PackageRecord } from "@pkgdex/catalog";
import { rowsForColumnCount } from "../table";
import { capitalize, describeVersions, escapeHtml, formatDescription, quoteUrl } from "../text";
import { lineWriter, packageCountSentence, type Formatter, type PrintLine } from "./types";

/** Columns in the index table */
export const HTML_TABLE_COLUMNS = 3;

/** Sphinx gives the page title id1, so package headings start at id2. */
const FIRST_SPAN_ID = 2;

export function internalLink(name: string): string {
  return `<a class="reference internal" href="#${quoteUrl(name)}">${escapeHtml(name)}</a>`;
}

function printIndexTable(print: PrintLine, names: readonly string[]): void {
  print('<table border="1" class="docutils">');
  print('<tbody valign="top">');
  let i = 0;
  for (const row of rowsForColumnCount(names, HTML_TABLE_COLUMNS)) {
    print(i % 2 === 0 ? '<tr class="row-odd">' : '<tr class="row-even">');
    for (const name of row) {
      print(name === undefined ? "<td></td>" : `<td>${internalLink(name)}</td>`);
    }
    print("</tr>");
    i++;
  }
  print("</tbody>");
  print("</table>");
  print('<hr class="docutils"/>');
}

function printLinkItem(print: PrintLine, term: string, href: string, text: string): void {
  print(`<dt>${term}:</dt>`);
  print('<dd><ul class="first last simple">');
  print(`<li><a class="reference external" href="${quoteUrl(href)}">${text}</a></li>`);
  print("</ul></dd>");
}

function printPackage(
  print: PrintLine,
  pkg: PackageRecord,
  listed: ReadonlySet<string>,
  sourceLink: string,
  spanId: number,
): void {
  const id = quoteUrl(pkg.name);
  const title = escapeHtml(pkg.name);

  print(`<div class="section" id="${id}">`);
  print(
    `<span id="id${spanId}"></span><h1>${title}` +
      `<a class="headerlink" href="#${id}" title="Permalink to this headline">&para;</a></h1>`,
  );
  print('<dl class="docutils">');

  printLinkItem(print, "Homepage", pkg.homepage, escapeHtml(pkg.homepage));
  printLinkItem(print, "Source", sourceLink, `${title}/package.yaml`);

  if (pkg.versions.length > 0) {
    print("<dt>Versions:</dt>");
    print("<dd>");
    print(escapeHtml(describeVersions(pkg.versions)));
    print("</dd>");
  }

  for (const type of ALL_DEPENDENCY_TYPES) {
    const deps = pkg.dependencies[type] ?? [];
    if (deps.length === 0) continue;
    print(`<dt>${capitalize(type)} Dependencies:</dt>`);
    print("<dd>");
    print(deps.map((d) => (listed.has(d) ? internalLink(d) : escapeHtml(d))).join(", "));
    print("</dd>");
  }

  print("<dt>Description:</dt>");
  print("<dd>");
  print(escapeHtml(formatDescription(pkg.description, 2)));
  print("</dd>");
  print("</dl>");
  print('<hr class="docutils"/>');
  print("</div>");
}

export const html: Formatter = (names, { catalog, out, sourceLinkFor }) => {
  const pkgs = names.map((name) => catalog.get(name));
  const listed = new Set(names);
  const print = lineWriter(out);

  print("<p>");
  print(packageCountSentence(pkgs.length));
  print("</p>");

  printIndexTable(print, names);

  pkgs.forEach((pkg, i) => {
    printPackage(print, pkg, listed, sourceLinkFor(pkg), FIRST_SPAN_ID + i);
  });
};
