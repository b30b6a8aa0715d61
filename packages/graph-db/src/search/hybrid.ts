import type { EntityEdge, EntityNode } from "../types/graph.js";
import type { EdgeSearchConfig, EdgeSearchMethod, NodeSearchConfig, NodeSearchMethod } from "../types/search.js";
import { endpointUuids, reciprocalRankFusion, rerankByNodeDistance } from "./rank.js";

// Each method fetches more candidates than the final limit so fusion has room to reorder.
const CANDIDATE_MULTIPLIER = 2;

export const MAX_CENTER_DISTANCE = 3;

/** Storage-specific retrieval primitives that the hybrid search composes. */
export interface SearchBackend {
  edgeCandidates(method: EdgeSearchMethod, query: string, limit: number): Promise<EntityEdge[]>;
  nodeCandidates(method: NodeSearchMethod, query: string, limit: number): Promise<EntityNode[]>;
  /** Hop counts (up to MAX_CENTER_DISTANCE) from the center node; unreachable nodes are absent. */
  nodeDistances(centerNodeUuid: string, nodeUuids: string[]): Promise<Map<string, number>>;
}

function fuse<T extends { uuid: string }>(lists: T[][]): T[] {
  const byUuid = new Map<string, T>();
  for (const list of lists) {
    for (const item of list) byUuid.set(item.uuid, item);
  }
  return reciprocalRankFusion(lists.map((list) => list.map((item) => item.uuid))).flatMap((uuid) => {
    const item = byUuid.get(uuid);
    return item ? [item] : [];
  });
}

export async function hybridEdgeSearch(
  backend: SearchBackend,
  query: string,
  config: EdgeSearchConfig,
  centerNodeUuid?: string,
): Promise<EntityEdge[]> {
  if (config.reranker === "node_distance" && !centerNodeUuid) {
    throw new Error("Node distance reranking requires a center node uuid");
  }
  if (!query.trim()) return [];

  const lists: EntityEdge[][] = [];
  for (const method of config.methods) {
    lists.push(await backend.edgeCandidates(method, query, config.limit * CANDIDATE_MULTIPLIER));
  }

  let ranked = fuse(lists);
  if (config.reranker === "node_distance" && centerNodeUuid) {
    const distances = await backend.nodeDistances(centerNodeUuid, endpointUuids(ranked));
    ranked = rerankByNodeDistance(ranked, centerNodeUuid, distances);
  }
  return ranked.slice(0, config.limit);
}

export async function hybridNodeSearch(
  backend: SearchBackend,
  query: string,
  config: NodeSearchConfig,
): Promise<EntityNode[]> {
  if (!query.trim()) return [];

  const lists: EntityNode[][] = [];
  for (const method of config.methods) {
    lists.push(await backend.nodeCandidates(method, query, config.limit * CANDIDATE_MULTIPLIER));
  }
  return fuse(lists).slice(0, config.limit);
}
