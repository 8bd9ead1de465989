/**
 * `check` — verify that a resource root holds every BokehJS asset.
 */

import { resolve } from "node:path";
import type { Command } from "commander";
import { createLocator } from "../../config/loader.js";
import { DEFAULT_ASSET_ROOT } from "../../resources/resolver.js";
import { checkLayout, formatLayoutReport } from "../../resources/layout.js";
import { loadProgramConfig, runReported } from "../context.js";

export function registerCheckCommand(program: Command): void {
  program
    .command("check")
    .description("Check that the resource roots contain every js/css asset")
    .option("--root <dir>", "Resource root to check (overrides config)")
    .action(async (opts: { root?: string }) => {
      await runReported(async () => {
        const config = await loadProgramConfig(program);
        const roots = opts.root !== undefined ? [resolve(opts.root)] : config.resourceRoots;
        const label = roots.length > 0 ? roots.join(", ") : DEFAULT_ASSET_ROOT;

        const report = checkLayout(createLocator(roots));
        console.log(formatLayoutReport(report, label));
        if (!report.ok) process.exitCode = 1;
      });
    });
}
