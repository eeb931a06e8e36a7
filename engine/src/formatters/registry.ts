/**
 * pkgdex Engine — Formatter Registry
 *
 * The set of output formats is closed: every formatter is listed here,
 * in the order `--format` help shows them. The registry never changes
 * after this module loads.
 */

import { MissingFormatterError } from "../errors";
import { html } from "./html";
import { nameOnly } from "./name-only";
import { rst } from "./rst";
import type { Formatter } from "./types";

export const DEFAULT_FORMAT = "name_only";

export class FormatterRegistry {
  private readonly entries: ReadonlyMap<string, Formatter>;

  constructor(entries: Iterable<readonly [string, Formatter]>) {
    const map = new Map<string, Formatter>();
    for (const [name, formatter] of entries) {
      if (map.has(name)) {
        throw new Error(`Formatter "${name}" is registered twice`);
      }
      map.set(name, formatter);
    }
    this.entries = map;
  }

  /** Registered names, in registration order. */
  names(): string[] {
    return [...this.entries.keys()];
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /**
   * @throws MissingFormatterError when `name` is not registered
   */
  get(name: string): Formatter {
    const formatter = this.entries.get(name);
    if (!formatter) throw new MissingFormatterError(name, this.names());
    return formatter;
  }
}

export const formatters = new FormatterRegistry([
  [DEFAULT_FORMAT, nameOnly],
  ["rst", rst],
  ["html", html],
]);
