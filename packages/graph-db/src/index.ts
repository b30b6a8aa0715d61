export type { IKnowledgeGraph } from "./types/repository.js";
export type {
  AddEpisodeResult,
  AttributeValue,
  EntityEdge,
  EntityNode,
  EpisodeContent,
  EpisodeInput,
  EpisodeType,
  EpisodicNode,
  JsonObject,
  JsonPrimitive,
  JsonValue,
} from "./types/graph.js";
export type {
  EdgeReranker,
  EdgeSearchConfig,
  EdgeSearchMethod,
  NodeReranker,
  NodeSearchConfig,
  NodeSearchMethod,
  SearchOptions,
} from "./types/search.js";
export type { KnowledgeGraphOptions } from "./types/options.js";
export { Neo4jKnowledgeGraph } from "./neo4j/neo4j-knowledge-graph.js";
export type { Neo4jConfig } from "./neo4j/connection.js";
export { InMemoryKnowledgeGraph } from "./memory/in-memory-knowledge-graph.js";
export {
  EDGE_HYBRID_SEARCH_NODE_DISTANCE,
  EDGE_HYBRID_SEARCH_RRF,
  NODE_HYBRID_SEARCH_RRF,
  withLimit,
} from "./search/recipes.js";
export { parseEpisodeContent, serializeEpisodeBody } from "./episode.js";
export {
  describeError,
  EpisodeParseError,
  ExtractionError,
  isRateLimitError,
  RateLimitError,
} from "./errors.js";
export * from "./extraction/index.js";
export * from "./logging/index.js";
