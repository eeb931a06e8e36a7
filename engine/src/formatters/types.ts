/**
 * pkgdex Engine — Formatter Types
 */

import type { PackageCatalog } from "@pkgdex/catalog";
import type { SourceLinker } from "../source-link";

/** Anything a report can be written to; process.stdout fits. */
export interface ReportStream {
  write(chunk: string): unknown;
  /** True when writing to an interactive terminal */
  isTTY?: boolean;
}

export interface FormatterContext {
  catalog: PackageCatalog;
  out: ReportStream;
  sourceLinkFor: SourceLinker;
  /** Width to fit columnar output into */
  width: number;
}

/**
 * Renders a filtered, sorted list of package names.
 * Every name must be in `context.catalog`.
 */
export type Formatter = (names: readonly string[], context: FormatterContext) => void;

export type PrintLine = (text?: string) => void;

export function lineWriter(out: ReportStream): PrintLine {
  return (text = "") => {
    out.write(`${text}\n`);
  };
}

/** Opening sentence of the document formats */
export function packageCountSentence(count: number): string {
  return `This catalog currently has ${count} packages:`;
}
