/**
 * Asset layout check — does a resource set hold every file the resolver
 * may ask for?
 *
 * Each component ships a plain and a minified file for every asset kind it
 * has, under `js/` and `css/`.
 */

import type { AssetComponent, AssetKind } from "../components/components.js";
import { COMPONENTS, hasAsset } from "../components/components.js";
import type { ResourceLocator } from "./locator.js";
import { resourcePath } from "./naming.js";

const ASSET_KINDS: readonly AssetKind[] = ["js", "css"];

export interface LayoutReport {
  ok: boolean;
  present: string[];
  missing: string[];
}

/** Every path the packaging step must produce, in component order. */
export function expectedAssets(components: readonly AssetComponent[] = COMPONENTS): string[] {
  const paths: string[] = [];
  for (const component of components) {
    for (const kind of ASSET_KINDS) {
      if (!hasAsset(component, kind)) continue;
      paths.push(resourcePath(component, kind, false));
      paths.push(resourcePath(component, kind, true));
    }
  }
  return paths;
}

export function checkLayout(
  locator: ResourceLocator,
  components: readonly AssetComponent[] = COMPONENTS,
): LayoutReport {
  const present: string[] = [];
  const missing: string[] = [];

  for (const path of expectedAssets(components)) {
    if (locator.locate(path)) {
      present.push(path);
    } else {
      missing.push(path);
    }
  }

  return { ok: missing.length === 0, present, missing };
}

export function formatLayoutReport(report: LayoutReport, rootLabel: string): string {
  const lines: string[] = [];

  if (report.ok) {
    lines.push(`✅ All ${report.present.length} assets present in ${rootLabel}`);
    return lines.join("\n");
  }

  lines.push(`⚠️  ${report.missing.length} of ${report.present.length + report.missing.length} assets missing in ${rootLabel}\n`);
  for (const path of report.missing) {
    lines.push(`  ✗ ${path}`);
  }
  lines.push(`\n  Action: rebuild BokehJS or point resourceRoots at a complete build`);

  return lines.join("\n");
}
