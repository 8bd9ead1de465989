export {
  LOG_LEVELS,
  MODE_NAMES,
  MODES,
  DEFAULT_MODE,
  DEFAULT_MODE_NAME,
  isModeName,
  fromString,
  requireMode,
  remoteMode,
  withBaseUrl,
  isMoreVerbose,
  stringify,
  wrap,
} from "./modes.js";
export type { LogLevel, ModeLocation, DeploymentMode, ModeName } from "./modes.js";
