export {
  BokehCore,
  BokehWidgets,
  BokehCompiler,
  COMPONENTS,
  hasAsset,
  selectComponents,
} from "./components.js";
export type { AssetKind, AssetComponent } from "./components.js";
