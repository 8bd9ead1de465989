/**
 * Shared plumbing for CLI commands: global options, settings, error output.
 */

import { resolve } from "node:path";
import type { Command } from "commander";
import { buildSettings, loadConfig } from "../config/loader.js";
import type { ResourceSettings, SettingsOverrides } from "../config/loader.js";
import type { ResourcesConfig } from "../config/schema.js";
import { CONFIG_FILE_NAME } from "../config/schema.js";
import { isResourceError } from "../errors/errors.js";
import type { ResolutionLogger } from "../events/logger.js";
import { ConsoleEventLogger, JsonlEventLogger } from "../events/logger.js";

export type GlobalOptions = {
  config?: string;
  eventLog?: string;
  verbose?: boolean;
};

export function configPathOf(program: Command): string {
  return resolve(program.opts<GlobalOptions>().config ?? CONFIG_FILE_NAME);
}

export async function loadProgramConfig(program: Command): Promise<ResourcesConfig> {
  return loadConfig(configPathOf(program));
}

/** `--event-log` wins over `--verbose`; with neither, the config's `eventLogDir` applies. */
function programLogger(program: Command): ResolutionLogger | undefined {
  const { eventLog, verbose } = program.opts<GlobalOptions>();
  if (eventLog !== undefined) return new JsonlEventLogger(resolve(eventLog), "cli");
  if (verbose) return new ConsoleEventLogger();
  return undefined;
}

/** Config file + env + global flags → settings. */
export async function loadProgramSettings(
  program: Command,
  overrides: SettingsOverrides = {},
): Promise<ResourceSettings> {
  const config = await loadProgramConfig(program);
  return buildSettings(config, {
    ...overrides,
    logger: overrides.logger ?? programLogger(program),
  });
}

/**
 * Run a command body, printing resource errors instead of crashing.
 * Anything else is a bug and propagates.
 */
export async function runReported(body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (err) {
    if (!isResourceError(err)) throw err;
    console.error(`❌ ${err.message}`);
    process.exitCode = 1;
  }
}
