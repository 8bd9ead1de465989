/**
 * BokehJS asset components.
 *
 * A component is a named group of assets shipped together. Which kinds of
 * asset it ships is an explicit capability set, so a component without a
 * stylesheet is just one whose set lacks "css".
 */

import type { ModelReference } from "../models/references.js";
import { requirementsOf } from "../models/references.js";

export type AssetKind = "js" | "css";

export interface AssetComponent {
  readonly name: string;
  readonly assets: ReadonlySet<AssetKind>;
}

export const BokehCore: AssetComponent = {
  name: "bokeh",
  assets: new Set<AssetKind>(["js", "css"]),
};

export const BokehWidgets: AssetComponent = {
  name: "bokeh-widgets",
  assets: new Set<AssetKind>(["js", "css"]),
};

export const BokehCompiler: AssetComponent = {
  name: "bokeh-compiler",
  assets: new Set<AssetKind>(["js"]),
};

/** Every component, in selection priority order. */
export const COMPONENTS: readonly AssetComponent[] = [BokehCore, BokehWidgets, BokehCompiler];

export function hasAsset(component: AssetComponent, kind: AssetKind): boolean {
  return component.assets.has(kind);
}

/**
 * Components needed to display `refs`: core always, then widgets and the
 * compiler when any reference asks for them. Order is fixed and there are
 * no duplicates.
 */
export function selectComponents(refs: readonly ModelReference[]): AssetComponent[] {
  let widgets = false;
  let compiler = false;

  for (const ref of refs) {
    const req = requirementsOf(ref);
    widgets ||= req.widgets;
    compiler ||= req.compiler;
    if (widgets && compiler) break;
  }

  const selected: AssetComponent[] = [BokehCore];
  if (widgets) selected.push(BokehWidgets);
  if (compiler) selected.push(BokehCompiler);
  return selected;
}
