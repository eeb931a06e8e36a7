/**
 * pkgdex CLI — Program
 *
 * Builds the commander program. Kept apart from the entry point so tests
 * can drive commands in process with their own I/O.
 */

import { Command } from "commander";
import { registerListCommand, defaultIO, type CliIO } from "./commands/list";

export const VERSION = "0.1.0";

export function createProgram(io: CliIO = defaultIO()): Command {
  const program = new Command();

  program
    .name("pkgdex")
    .description("Query a package catalog and generate package reports")
    .version(VERSION);

  registerListCommand(program, io);

  return program;
}
