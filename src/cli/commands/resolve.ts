/**
 * `resolve` — print the bundle for a set of model references.
 */

import { readFile } from "node:fs/promises";
import type { Command } from "commander";
import { ModelReferenceList } from "../../models/references.js";
import type { ModelReference } from "../../models/references.js";
import { stringify } from "../../modes/modes.js";
import { renderBundle } from "../../resources/html.js";
import { resolveBundle } from "../../resources/resolver.js";
import { loadProgramSettings, runReported } from "../context.js";

interface ResolveOptions {
  mode?: string;
  format: string;
}

/**
 * Read a JSON array of model references. Returns a list of problems
 * instead when the file does not validate.
 */
export async function readReferences(file: string): Promise<{ refs: ModelReference[] } | { problems: string[] }> {
  let content: string;
  try {
    content = await readFile(file, "utf-8");
  } catch (err) {
    return { problems: [`${file}: ${err instanceof Error ? err.message : String(err)}`] };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    return { problems: [`${file}: ${err instanceof Error ? err.message : String(err)}`] };
  }

  const result = ModelReferenceList.safeParse(raw);
  if (!result.success) {
    return {
      problems: result.error.issues.map(i => `${file} at ${i.path.join(".") || "(root)"}: ${i.message}`),
    };
  }
  return { refs: result.data };
}

export function registerResolveCommand(program: Command): void {
  program
    .command("resolve [refs-file]")
    .description("Resolve the BokehJS scripts and stylesheets a document needs")
    .option("--mode <name>", "Deployment mode (overrides BOKEH_RESOURCES and config)")
    .option("--format <format>", "Output format (json|html)", "json")
    .action(async (refsFile: string | undefined, opts: ResolveOptions) => {
      if (opts.format !== "json" && opts.format !== "html") {
        console.error(`❌ Unknown format: ${opts.format} (expected json or html)`);
        process.exitCode = 1;
        return;
      }

      let refs: ModelReference[] = [];
      if (refsFile !== undefined) {
        const parsed = await readReferences(refsFile);
        if ("problems" in parsed) {
          console.error("❌ Invalid model references:");
          for (const problem of parsed.problems) console.error(`  ✗ ${problem}`);
          process.exitCode = 1;
          return;
        }
        refs = parsed.refs;
      }

      await runReported(async () => {
        const { mode, environment } = await loadProgramSettings(program, { mode: opts.mode });
        const bundle = resolveBundle(mode, refs, environment);
        console.log(opts.format === "html" ? renderBundle(bundle) : stringify(mode, bundle));
      });
    });
}
