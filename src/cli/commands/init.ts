/**
 * `init` — write a default config file.
 */

import { access } from "node:fs/promises";
import type { Command } from "commander";
import { writeDefaultConfig } from "../../config/loader.js";
import { configPathOf } from "../context.js";

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export function registerInitCommand(program: Command): void {
  program
    .command("init")
    .description("Write a default bokeh-resources.yaml")
    .option("--force", "Overwrite an existing config file", false)
    .action(async (opts: { force: boolean }) => {
      const configPath = configPathOf(program);

      if (!opts.force && (await exists(configPath))) {
        console.error(`❌ Config already exists: ${configPath} (use --force to overwrite)`);
        process.exitCode = 1;
        return;
      }

      const config = await writeDefaultConfig(configPath);
      console.log(`✅ Wrote ${configPath}`);
      console.log(`  mode: ${config.mode}`);
      console.log(`  version: ${config.version}`);
    });
}
