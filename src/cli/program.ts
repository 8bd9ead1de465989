/**
 * bokeh-resources CLI program.
 */

import { Command } from "commander";
import { registerCheckCommand } from "./commands/check.js";
import { registerInitCommand } from "./commands/init.js";
import { registerModesCommand } from "./commands/modes.js";
import { registerResolveCommand } from "./commands/resolve.js";
import { CONFIG_FILE_NAME } from "../config/schema.js";
import { BOKEH_VERSION } from "../version.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("bokeh-resources")
    .description("Resolve BokehJS scripts and stylesheets for standalone HTML documents")
    .version(BOKEH_VERSION)
    .option("--config <file>", `Config file (default: ./${CONFIG_FILE_NAME})`)
    .option("--event-log <dir>", "Append resolution events to <dir>/<date>.jsonl")
    .option("--verbose", "Print resolution events to stderr", false);

  registerModesCommand(program);
  registerResolveCommand(program);
  registerCheckCommand(program);
  registerInitCommand(program);

  return program;
}
