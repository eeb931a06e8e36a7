/**
 * pkgdex Engine — Column Layout
 *
 * Lays a list of strings out in uniform-width columns, filled
 * column-major: items run down the first column, then the second.
 *
 *   a  d  g
 *   b  e
 *   c  f
 */

/** Terminal width assumed when none is known */
export const DEFAULT_WIDTH = 80;

export interface LayoutOptions {
  /** Width to fit the columns into */
  width?: number;
  /** Spaces added after the longest item */
  padding?: number;
  /** Force this many columns instead of fitting to `width` */
  columns?: number;
}

export interface ColumnLayout {
  columnCount: number;
  columnWidths: number[];
}

export type Row = ReadonlyArray<string | undefined>;

/**
 * Choose a column count and per-column widths for `items`.
 */
export function layoutColumns(
  items: readonly string[],
  options: LayoutOptions = {},
): ColumnLayout {
  const width = options.width ?? DEFAULT_WIDTH;
  const padding = options.padding ?? 2;

  const longest = items.reduce((max, item) => Math.max(max, item.length), 0);
  const columnWidth = longest + padding;

  let columnCount: number;
  if (options.columns !== undefined) {
    columnCount = Math.max(1, Math.floor(options.columns));
  } else {
    const fit = Math.max(1, Math.floor(width / columnWidth));
    columnCount = Math.max(1, Math.min(fit, items.length));
  }

  return {
    columnCount,
    columnWidths: new Array<number>(columnCount).fill(columnWidth),
  };
}

/**
 * Rows of a `columnCount`-wide table holding `items` column-major.
 * Cells past the last item are `undefined`.
 *
 * The result can be iterated any number of times; each pass walks the
 * items again.
 */
export function rowsForColumnCount(
  items: readonly string[],
  columnCount: number,
): Iterable<Row> {
  if (!Number.isInteger(columnCount) || columnCount < 1) {
    throw new RangeError(`Column count must be a positive integer, got ${columnCount}`);
  }

  const rowCount = Math.ceil(items.length / columnCount);
  return {
    *[Symbol.iterator]() {
      for (let r = 0; r < rowCount; r++) {
        const row: Array<string | undefined> = [];
        for (let c = 0; c < columnCount; c++) {
          const i = c * rowCount + r;
          row.push(i < items.length ? items[i] : undefined);
        }
        yield row;
      }
    },
  };
}

/**
 * Render `items` as text lines using `layout`. Each cell is padded to
 * its column width; trailing spaces are dropped.
 */
export function renderColumns(items: readonly string[], layout: ColumnLayout): string[] {
  const lines: string[] = [];
  for (const row of rowsForColumnCount(items, layout.columnCount)) {
    const line = row
      .map((cell, c) => (cell ?? "").padEnd(layout.columnWidths[c]))
      .join("");
    lines.push(line.trimEnd());
  }
  return lines;
}
