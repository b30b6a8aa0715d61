import type { ServiceLogger } from "../logging/logger-factory.js";

export interface KnowledgeGraphOptions {
  /** Partition key stored on every node and edge; searches only see their own group. */
  groupId?: string;
  newUuid?: () => string;
  clock?: () => Date;
  logger?: ServiceLogger;
}
