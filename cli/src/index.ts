#!/usr/bin/env node

/**
 * pkgdex CLI — Entry Point
 *
 * Commands:
 *   pkgdex list [filter...]    List and search available packages
 *
 * Exit codes:
 *   0 - report written (including reports with no packages)
 *   1 - bad pattern, unknown format, catalog or configuration error
 */

import { createProgram } from "./program";
import { printError } from "./output";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    printError(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
