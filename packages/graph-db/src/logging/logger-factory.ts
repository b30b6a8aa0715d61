import type { Logger } from "./logger.js";
import { logger as baseLogger } from "./logger.js";

export type ServiceLogger = Logger;

/**
 * Create a child logger tagged with the service name.
 *
 * @example
 * ```typescript
 * const logger = createServiceLogger("Neo4jKnowledgeGraph");
 * logger.info({ uri }, "Connected to Neo4j");
 * // {"level":"info","service":"Neo4jKnowledgeGraph","uri":"bolt://...","msg":"Connected to Neo4j"}
 * ```
 */
export function createServiceLogger(serviceName: string): ServiceLogger {
  return baseLogger.child({ service: serviceName });
}
