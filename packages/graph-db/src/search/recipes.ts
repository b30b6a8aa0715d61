import type { EdgeSearchConfig, NodeSearchConfig } from "../types/search.js";

export const DEFAULT_SEARCH_LIMIT = 10;

export const EDGE_HYBRID_SEARCH_RRF = Object.freeze<EdgeSearchConfig>({
  methods: ["fulltext", "graph"],
  reranker: "rrf",
  limit: DEFAULT_SEARCH_LIMIT,
});

export const EDGE_HYBRID_SEARCH_NODE_DISTANCE = Object.freeze<EdgeSearchConfig>({
  methods: ["fulltext", "graph"],
  reranker: "node_distance",
  limit: DEFAULT_SEARCH_LIMIT,
});

export const NODE_HYBRID_SEARCH_RRF = Object.freeze<NodeSearchConfig>({
  methods: ["fulltext", "graph"],
  reranker: "rrf",
  limit: DEFAULT_SEARCH_LIMIT,
});

/** Copy a recipe with a different result limit; the recipe itself is never mutated. */
export function withLimit(recipe: Readonly<NodeSearchConfig>, limit: number): NodeSearchConfig;
export function withLimit(recipe: Readonly<EdgeSearchConfig>, limit: number): EdgeSearchConfig;
export function withLimit(
  recipe: Readonly<EdgeSearchConfig | NodeSearchConfig>,
  limit: number,
): EdgeSearchConfig | NodeSearchConfig {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Search limit must be a positive integer, got ${limit}`);
  }
  return { ...recipe, methods: [...recipe.methods], limit };
}
