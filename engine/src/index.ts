/**
 * pkgdex Engine — Public API
 *
 * This is the single entry point for the engine package.
 * The CLI imports from here, never from internal modules.
 */

// Report generation
export { generateReport } from "./report";
export type { ReportOptions, ReportRequest, ReportResult } from "./report";

// Filtering
export { compilePattern } from "./pattern";
export type { PatternMatcher } from "./pattern";
export { filterPackages, sortNames, compareNames, EMPTY_FILTER } from "./filter";
export type { FilterSpec } from "./filter";

// Layout and text helpers
export {
  layoutColumns,
  rowsForColumnCount,
  renderColumns,
  DEFAULT_WIDTH,
} from "./table";
export type { ColumnLayout, LayoutOptions, Row } from "./table";
export {
  escapeHtml,
  capitalize,
  wrapWords,
  formatDescription,
  describeVersions,
  quoteUrl,
} from "./text";
export { createSourceLinker, DEFAULT_SOURCE_URL } from "./source-link";
export type { SourceLinker } from "./source-link";

// Formatters
export {
  formatters,
  FormatterRegistry,
  DEFAULT_FORMAT,
  nameOnly,
  rst,
  rstTable,
  headingRule,
  html,
  internalLink,
  HTML_TABLE_COLUMNS,
} from "./formatters";
export type { Formatter, FormatterContext, ReportStream } from "./formatters";

// Errors
export { PatternError, MissingFormatterError } from "./errors";

// Logging
export { createLogger, LOG_LEVELS } from "./utils/logger";
export type { Logger, LoggerOptions, LogLevel } from "./utils/logger";
