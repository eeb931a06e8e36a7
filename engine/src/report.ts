/**
 * pkgdex Engine — Report Generation
 *
 * Filter the catalog, pick the formatter, write the report. This is the
 * one call the CLI makes; embedders can call it with their own catalog
 * and stream.
 */

import type { PackageCatalog } from "@pkgdex/catalog";
import { filterPackages, type FilterSpec } from "./filter";
import { formatters as defaultRegistry, type FormatterRegistry } from "./formatters/registry";
import type { ReportStream } from "./formatters/types";
import { createSourceLinker, type SourceLinker } from "./source-link";
import { DEFAULT_WIDTH } from "./table";
import { createLogger, type Logger } from "./utils/logger";

let defaultLogger: Logger | undefined;

/** Silent logger shared by every call that passes none. */
function fallbackLogger(): Logger {
  defaultLogger ??= createLogger();
  return defaultLogger;
}

export interface ReportRequest extends FilterSpec {
  /** Registered formatter name */
  format: string;
}

export interface ReportOptions {
  sourceLinkFor?: SourceLinker;
  /** Terminal width for columnar output */
  width?: number;
  logger?: Logger;
  registry?: FormatterRegistry;
}

export interface ReportResult {
  format: string;
  /** Names the report covered, in report order */
  names: string[];
}

/**
 * Write the report for `request` to `out`.
 *
 * The formatter is resolved before anything is written, so an unknown
 * format produces no output. Errors raised mid-report propagate; output
 * already written stays written.
 *
 * @throws PatternError, MissingFormatterError, CatalogLookupError
 */
export function generateReport(
  catalog: PackageCatalog,
  request: ReportRequest,
  out: ReportStream,
  options: ReportOptions = {},
): ReportResult {
  const logger = options.logger ?? fallbackLogger();
  const registry = options.registry ?? defaultRegistry;

  const formatter = registry.get(request.format);

  logger.debug(
    {
      patterns: request.patterns,
      searchDescription: request.searchDescription,
      tags: request.tags,
      catalogSize: catalog.size,
    },
    "Filtering catalog",
  );
  const names = filterPackages(catalog, request);

  logger.debug({ format: request.format, count: names.length }, "Rendering report");
  formatter(names, {
    catalog,
    out,
    sourceLinkFor: options.sourceLinkFor ?? createSourceLinker(),
    width: options.width ?? DEFAULT_WIDTH,
  });

  logger.info({ format: request.format, count: names.length }, "Report written");
  return { format: request.format, names };
}
