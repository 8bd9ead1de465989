/**
 * `modes` — list deployment mode selectors.
 */

import type { Command } from "commander";
import type { DeploymentMode } from "../../modes/modes.js";
import { DEFAULT_MODE_NAME, MODES, MODE_NAMES } from "../../modes/modes.js";

export function describeLocation(mode: DeploymentMode): string {
  const location = mode.location;
  switch (location.kind) {
    case "inline":
      return "inline";
    case "local":
      return `local (${location.paths})`;
    case "remote":
      return `remote (${location.baseUrl})`;
  }
}

export function formatModeTable(): string {
  const lines: string[] = [];
  for (const name of MODE_NAMES) {
    const mode = MODES[name];
    const marker = name === DEFAULT_MODE_NAME ? "*" : " ";
    const min = mode.minified ? "minified" : "unminified";
    lines.push(`${marker} ${name.padEnd(13)} ${min.padEnd(11)} log=${mode.logLevel.padEnd(6)} ${describeLocation(mode)}`);
  }
  lines.push("\n* default");
  return lines.join("\n");
}

export function registerModesCommand(program: Command): void {
  program
    .command("modes")
    .description("List deployment mode selectors")
    .action(() => {
      console.log(formatModeTable());
    });
}
