export { logger } from "./logger.js";
export type { Logger } from "./logger.js";
export { createServiceLogger } from "./logger-factory.js";
export type { ServiceLogger } from "./logger-factory.js";
