import type { AddEpisodeResult, EntityEdge, EntityNode, EpisodeInput, EpisodicNode } from "./graph.js";
import type { NodeSearchConfig, SearchOptions } from "./search.js";

/**
 * Abstract interface for knowledge graph access.
 * Implementations: Neo4jKnowledgeGraph (server), InMemoryKnowledgeGraph (tests/offline).
 */
export interface IKnowledgeGraph {
  // Episode operations
  addEpisode(input: EpisodeInput): Promise<AddEpisodeResult>;
  getEpisode(uuid: string): Promise<EpisodicNode | null>;

  // Search
  search(query: string, options?: SearchOptions): Promise<EntityEdge[]>;
  searchNodes(query: string, config: NodeSearchConfig): Promise<EntityNode[]>;

  // Lifecycle
  connect(): Promise<void>;
  buildIndicesAndConstraints(): Promise<void>;
  disconnect(): Promise<void>;
}
