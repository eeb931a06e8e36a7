/**
 * pkgdex Engine — Plain Name Listing
 *
 * On a terminal: a package count, then names in as many columns as fit.
 * Piped: one name per line, nothing else, so the output can be fed to
 * other tools.
 */

import { layoutColumns, renderColumns } from "../table";
import { lineWriter, type Formatter } from "./types";

export const nameOnly: Formatter = (names, { out, width }) => {
  const print = lineWriter(out);

  if (out.isTTY) {
    print(`${names.length} packages.`);
  }

  const layout = layoutColumns(names, out.isTTY ? { width } : { columns: 1 });
  for (const line of renderColumns(names, layout)) {
    print(line);
  }
};
