export type EdgeSearchMethod = "fulltext" | "graph";
export type NodeSearchMethod = "fulltext" | "graph";

export type EdgeReranker = "rrf" | "node_distance";
export type NodeReranker = "rrf";

export interface EdgeSearchConfig {
  methods: EdgeSearchMethod[];
  reranker: EdgeReranker;
  limit: number;
}

export interface NodeSearchConfig {
  methods: NodeSearchMethod[];
  reranker: NodeReranker;
  limit: number;
}

export interface SearchOptions {
  centerNodeUuid?: string;
  limit?: number;
}
