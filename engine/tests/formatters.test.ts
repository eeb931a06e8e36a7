/**
 * pkgdex Engine — Formatter Tests
 *
 * Each formatter writes to an in-memory stream; assertions are on the
 * exact text produced.
 */

import { describe, it, expect } from "vitest";
import {
  CatalogLookupError,
  MemoryCatalog,
  type PackageCatalog,
  type PackageRecord,
} from "@pkgdex/catalog";
import { FormatterRegistry, formatters } from "../src/formatters/registry";
import { nameOnly } from "../src/formatters/name-only";
import { headingRule, rst, rstTable } from "../src/formatters/rst";
import { html } from "../src/formatters/html";
import type { Formatter, FormatterContext } from "../src/formatters/types";
import { createSourceLinker } from "../src/source-link";
import { MissingFormatterError } from "../src/errors";

// ─── Helpers ─────────────────────────────────────────────────

function record(name: string, overrides: Partial<PackageRecord> = {}): PackageRecord {
  return {
    name,
    homepage: `https://example.com/${name}`,
    description: "",
    versions: [],
    dependencies: {},
    tags: [],
    ...overrides,
  };
}

function capture(isTTY = false) {
  const chunks: string[] = [];
  return {
    stream: {
      isTTY,
      write(chunk: string) {
        chunks.push(chunk);
        return true;
      },
    },
    text: () => chunks.join(""),
  };
}

function render(
  formatter: Formatter,
  names: string[],
  catalog: PackageCatalog,
  options: { isTTY?: boolean; width?: number } = {},
): string {
  const out = capture(options.isTTY ?? false);
  const context: FormatterContext = {
    catalog,
    out: out.stream,
    sourceLinkFor: createSourceLinker("https://example.org/{name}.yaml"),
    width: options.width ?? 80,
  };
  formatter(names, context);
  return out.text();
}

const STATS = new MemoryCatalog([
  record("icu4c", { versions: ["58.2", "60.1"], description: "Unicode support." }),
  record("r", {
    versions: ["3.5.1", "3.10.0"],
    dependencies: { build: ["pkgconf"], link: ["icu4c", "readline"] },
    description: "R & stats <fast>",
  }),
]);

// ─── name_only ───────────────────────────────────────────────

describe("name_only", () => {
  it("prints one name per line when not on a terminal", () => {
    const catalog = new MemoryCatalog([record("A", { versions: ["1.0", "2.0"] })]);
    expect(render(nameOnly, ["A"], catalog)).toBe("A\n");
  });

  it("prints a count and fitted columns on a terminal", () => {
    const names = ["alpha", "beta", "gamma", "delta", "eps"];
    const catalog = new MemoryCatalog(names.map((n) => record(n)));
    expect(render(nameOnly, names, catalog, { isTTY: true, width: 20 })).toBe(
      "5 packages.\nalpha  delta\nbeta   eps\ngamma\n",
    );
  });

  it("handles an empty list", () => {
    const empty = new MemoryCatalog([]);
    expect(render(nameOnly, [], empty)).toBe("");
    expect(render(nameOnly, [], empty, { isTTY: true })).toBe("0 packages.\n");
  });
});

// ─── rst ─────────────────────────────────────────────────────

describe("headingRule", () => {
  it("matches the title length", () => {
    expect(headingRule("henson")).toBe("------");
  });

  it("is never shorter than 2", () => {
    expect(headingRule("R")).toBe("--");
  });
});

describe("rstTable", () => {
  it("frames the columns with = borders one shorter than each column", () => {
    expect(rstTable(["`a`_", "`bb`_"], 80)).toBe("====== ======\n`a`_   `bb`_\n====== ======");
  });

  it("renders an empty table region", () => {
    expect(rstTable([], 80)).toBe("=\n=");
  });
});

describe("rst", () => {
  it("renders a package without versions or dependencies", () => {
    const catalog = new MemoryCatalog([
      record("solo", { description: "A lone package." }),
    ]);

    expect(render(rst, ["solo"], catalog)).toBe(
      [
        ".. _package-list:",
        "",
        "============",
        "Package List",
        "============",
        "",
        "This is a list of things you can install using pkgdex.  It is",
        "automatically generated based on the packages in the catalog.",
        "",
        "This catalog currently has 1 packages:",
        "",
        "========",
        "`solo`_",
        "========",
        "",
        "-----",
        "",
        ".. _solo:",
        "",
        "----",
        "solo",
        "----",
        "",
        "Homepage:",
        "  * `https://example.com/solo <https://example.com/solo>`__",
        "",
        "Source:",
        "  * `solo/package.yaml <https://example.org/solo.yaml>`__",
        "",
        "Description:",
        "  A lone package.",
        "",
        "",
      ].join("\n"),
    );
  });

  it("uses a two-character rule for one-letter names", () => {
    const output = render(rst, ["r"], STATS);
    expect(output).toContain("\n--\nr\n--\n");
  });

  it("lists versions newest first", () => {
    const output = render(rst, ["r"], STATS);
    expect(output).toContain("Versions:\n  3.10.0, 3.5.1\n");
  });

  it("links dependencies that are in the report and not others", () => {
    const output = render(rst, ["icu4c", "r"], STATS);
    expect(output).toContain("Build Dependencies\n  pkgconf\n");
    expect(output).toContain("Link Dependencies\n  icu4c_, readline\n");

    const alone = render(rst, ["r"], STATS);
    expect(alone).toContain("Link Dependencies\n  icu4c, readline\n");
  });

  it("escapes the homepage text but not the link target", () => {
    const catalog = new MemoryCatalog([record("q", { homepage: "https://example.com/?a=1&b=2" })]);
    expect(render(rst, ["q"], catalog)).toContain(
      "  * `https://example.com/?a=1&amp;b=2 <https://example.com/?a=1&b=2>`__\n",
    );
  });

  it("reports zero packages for an empty list", () => {
    const output = render(rst, [], new MemoryCatalog([]));
    expect(output).toContain("This catalog currently has 0 packages:\n\n=\n=\n");
    expect(output).not.toContain("-----");
  });

  it("fails on a name missing from the catalog before writing sections", () => {
    const out = capture();
    const context: FormatterContext = {
      catalog: STATS,
      out: out.stream,
      sourceLinkFor: createSourceLinker(),
      width: 80,
    };
    expect(() => rst(["icu4c", "ghost"], context)).toThrow(CatalogLookupError);
    expect(out.text()).toBe("");
  });
});

// ─── html ────────────────────────────────────────────────────

describe("html", () => {
  it("opens with a summary and a three-column index table", () => {
    const output = render(html, ["icu4c", "r"], STATS);
    expect(output.startsWith(
      [
        "<p>",
        "This catalog currently has 2 packages:",
        "</p>",
        '<table border="1" class="docutils">',
        '<tbody valign="top">',
        '<tr class="row-odd">',
        '<td><a class="reference internal" href="#icu4c">icu4c</a></td>',
        '<td><a class="reference internal" href="#r">r</a></td>',
        "<td></td>",
        "</tr>",
        "</tbody>",
        "</table>",
        '<hr class="docutils"/>',
        "",
      ].join("\n"),
    )).toBe(true);
  });

  it("alternates row classes", () => {
    const names = ["a", "b", "c", "d", "e", "f", "g"];
    const catalog = new MemoryCatalog(names.map((n) => record(n)));
    const output = render(html, names, catalog);
    expect(output.split('<tr class="row-odd">')).toHaveLength(3);
    expect(output.split('<tr class="row-even">')).toHaveLength(2);
  });

  it("renders one section per package with increasing span ids", () => {
    const output = render(html, ["icu4c", "r"], STATS);
    expect(output).toContain(
      '<div class="section" id="icu4c">\n<span id="id2"></span><h1>icu4c<a class="headerlink" ' +
        'href="#icu4c" title="Permalink to this headline">&para;</a></h1>\n',
    );
    expect(output).toContain('<div class="section" id="r">\n<span id="id3"></span><h1>r');
    expect(output.split('<hr class="docutils"/>\n</div>\n')).toHaveLength(3);
  });

  it("renders links, versions and dependencies", () => {
    const output = render(html, ["icu4c", "r"], STATS);
    expect(output).toContain(
      [
        "<dt>Homepage:</dt>",
        '<dd><ul class="first last simple">',
        '<li><a class="reference external" href="https://example.com/r">https://example.com/r</a></li>',
        "</ul></dd>",
        "<dt>Source:</dt>",
        '<dd><ul class="first last simple">',
        '<li><a class="reference external" href="https://example.org/r.yaml">r/package.yaml</a></li>',
        "</ul></dd>",
        "<dt>Versions:</dt>",
        "<dd>",
        "3.10.0, 3.5.1",
        "</dd>",
        "<dt>Build Dependencies:</dt>",
        "<dd>",
        "pkgconf",
        "</dd>",
        "<dt>Link Dependencies:</dt>",
        "<dd>",
        '<a class="reference internal" href="#icu4c">icu4c</a>, readline',
        "</dd>",
      ].join("\n"),
    );
  });

  it("escapes descriptions", () => {
    const output = render(html, ["r"], STATS);
    expect(output).toContain("<dt>Description:</dt>\n<dd>\n  R &amp; stats &lt;fast&gt;\n</dd>\n</dl>\n");
  });

  it("renders only the summary and an empty table for no packages", () => {
    expect(render(html, [], new MemoryCatalog([]))).toBe(
      [
        "<p>",
        "This catalog currently has 0 packages:",
        "</p>",
        '<table border="1" class="docutils">',
        '<tbody valign="top">',
        "</tbody>",
        "</table>",
        '<hr class="docutils"/>',
        "",
      ].join("\n"),
    );
  });

  it("fails on a name missing from the catalog", () => {
    expect(() => render(html, ["ghost"], STATS)).toThrow(CatalogLookupError);
  });
});

// ─── Registry ────────────────────────────────────────────────

describe("FormatterRegistry", () => {
  it("lists the built-in formats in registration order", () => {
    expect(formatters.names()).toEqual(["name_only", "rst", "html"]);
  });

  it("returns registered formatters", () => {
    expect(formatters.get("rst")).toBe(rst);
    expect(formatters.has("html")).toBe(true);
  });

  it("throws MissingFormatterError for an unknown format", () => {
    expect(() => formatters.get("pdf")).toThrow(
      new MissingFormatterError("pdf", ["name_only", "rst", "html"]),
    );
    expect(() => formatters.get("pdf")).toThrow(
      'Unknown format "pdf" (available: name_only, rst, html)',
    );
  });

  it("rejects a name registered twice", () => {
    expect(() => new FormatterRegistry([["x", nameOnly], ["x", rst]])).toThrow(
      'Formatter "x" is registered twice',
    );
  });
});
