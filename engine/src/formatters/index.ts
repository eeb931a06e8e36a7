export { formatters, FormatterRegistry, DEFAULT_FORMAT } from "./registry";
export { nameOnly } from "./name-only";
export { rst, rstTable, headingRule } from "./rst";
export { html, internalLink, HTML_TABLE_COLUMNS } from "./html";
export type { Formatter, FormatterContext, ReportStream } from "./types";
