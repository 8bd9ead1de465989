export {
  resolveBundle,
  logLevelScript,
  relativize,
  defaultEnvironment,
  DEFAULT_ASSET_ROOT,
} from "./resolver.js";
export type { AssetBundle, ResourceTag, TagSource, ResolveEnvironment } from "./resolver.js";

export { DirectoryLocator, MemoryLocator, LocatorChain } from "./locator.js";
export type { ResourceLocator } from "./locator.js";

export { resourceName, resourcePath } from "./naming.js";
export { renderTag, renderBundle, escapeAttribute } from "./html.js";
export { expectedAssets, checkLayout, formatLayoutReport } from "./layout.js";
export type { LayoutReport } from "./layout.js";
