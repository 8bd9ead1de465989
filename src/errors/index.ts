export {
  ResourceError,
  ResourceNotFoundError,
  UnsupportedLocationError,
  UnknownModeError,
  ConfigurationError,
  isResourceError,
} from "./errors.js";
export type { ResourceErrorCode, ResourceErrorOptions } from "./errors.js";
