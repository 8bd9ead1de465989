import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { expectedAssets } from "../layout.js";

/** Stand-in BokehJS build: every asset holds a comment naming its own path. */
export function assetContent(path: string): string {
  return `/* ${path} */`;
}

export async function makeAssetRoot(paths: string[] = expectedAssets()): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), "bokeh-resources-test-"));
  for (const path of paths) {
    await mkdir(dirname(join(root, path)), { recursive: true });
    await writeFile(join(root, path), assetContent(path), "utf-8");
  }
  return root;
}

export function memoryAssets(paths: string[] = expectedAssets()): Record<string, string> {
  return Object.fromEntries(paths.map(path => [path, assetContent(path)]));
}
