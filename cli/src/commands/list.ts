/**
 * pkgdex CLI — List Command
 *
 * Lists and searches the package catalog, writing the report to stdout.
 *
 * Usage:
 *   pkgdex list                     All packages, in columns
 *   pkgdex list mpi 'py-*'          Names containing "mpi" or starting with "py-"
 *   pkgdex list -d homology         Also search descriptions
 *   pkgdex list -t hpc              Packages tagged "hpc"
 *   pkgdex list --format rst        reStructuredText document
 *   pkgdex list --format html       HTML fragment for Sphinx
 *
 * Everything after the first filter pattern is read as a pattern, flags
 * included, so patterns starting with "-" need no quoting tricks.
 */

import { Command, Option } from "commander";
import { Catalog, type PackageCatalog } from "@pkgdex/catalog";
import {
  createLogger,
  createSourceLinker,
  DEFAULT_FORMAT,
  formatters,
  generateReport,
  type ReportResult,
  type ReportStream,
} from "@pkgdex/engine";
import { loadConfig } from "../config";
import { colors, printDebug, printWarn, setDebugMode } from "../output";

export interface ListOptions {
  searchDescription: boolean;
  format: string;
  tags?: string[];
  catalog?: string;
  debug: boolean;
}

/** What the list command reads from and writes to. */
export interface CliIO {
  out: ReportStream & { columns?: number };
  env: NodeJS.ProcessEnv;
  loadCatalog(dir: string): PackageCatalog;
}

export function defaultIO(): CliIO {
  return {
    out: process.stdout,
    env: process.env,
    loadCatalog: (dir) => new Catalog(dir),
  };
}

/**
 * Run a list query and write the report to `io.out`.
 */
export function runList(filter: string[], opts: ListOptions, io: CliIO): ReportResult {
  setDebugMode(opts.debug);

  const config = loadConfig(io.env, { catalog: opts.catalog });
  const logger = createLogger({ level: opts.debug ? "debug" : config.logLevel });
  printDebug(`catalog: ${config.catalogDir}`);

  const catalog = io.loadCatalog(config.catalogDir);
  if (catalog instanceof Catalog) {
    for (const problem of catalog.problems) {
      logger.warn({ file: problem.file }, problem.message);
      printWarn(`Skipped ${colors.pkg(problem.name)}: ${problem.message}`);
    }
  }

  return generateReport(
    catalog,
    {
      patterns: filter,
      searchDescription: opts.searchDescription,
      tags: opts.tags ?? [],
      format: opts.format,
    },
    io.out,
    {
      sourceLinkFor: createSourceLinker(config.sourceUrl),
      width: io.out.isTTY && io.out.columns ? io.out.columns : config.width,
      logger,
    },
  );
}

export function registerListCommand(program: Command, io: CliIO = defaultIO()): void {
  // Lets "list" hand everything after the first pattern to the patterns
  program.enablePositionalOptions();

  program
    .command("list")
    .description("List and search available packages")
    .argument("[filter...]", "optional case-insensitive glob patterns to filter results")
    .option(
      "-d, --search-description",
      "filtering will also search the description for a match",
      false,
    )
    .addOption(
      new Option("--format <name>", "format to be used to print the output")
        .choices(formatters.names())
        .default(DEFAULT_FORMAT),
    )
    .option("-t, --tags <tags...>", "only packages with any of these tags")
    .option("--catalog <dir>", "catalog directory (default: $PKGDEX_CATALOG or ~/.pkgdex/catalog)")
    .option("--debug", "print debug logs to stderr", false)
    .passThroughOptions()
    .action((filter: string[], opts: ListOptions) => {
      runList(filter, opts, io);
    });
}
