export { JsonlEventLogger, ConsoleEventLogger } from "./logger.js";
export type { ResourceEvent, ResourceEventType, ResolutionLogger } from "./logger.js";
