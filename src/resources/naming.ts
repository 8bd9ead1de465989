import type { AssetComponent, AssetKind } from "../components/components.js";

/**
 * File name of one component asset:
 * `<name>[-<version>][.min].<ext>`.
 *
 * Only remote URLs pass a version; bundled assets always match the running
 * binding, so their names carry none.
 */
export function resourceName(
  component: AssetComponent,
  ext: AssetKind,
  minified: boolean,
  version?: string,
): string {
  const ver = version !== undefined ? `-${version}` : "";
  const min = minified ? ".min" : "";
  return `${component.name}${ver}${min}.${ext}`;
}

/** Path of an asset inside the resource set: `js/...` or `css/...`. */
export function resourcePath(component: AssetComponent, ext: AssetKind, minified: boolean): string {
  return `${ext}/${resourceName(component, ext, minified)}`;
}
