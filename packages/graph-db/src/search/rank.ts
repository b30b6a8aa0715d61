import type { EntityEdge } from "../types/graph.js";

/**
 * Reciprocal rank fusion: each ranking contributes 1 / (rank + rankConst) to an
 * item's score. Ties keep first-seen order.
 */
export function reciprocalRankFusion(rankings: readonly (readonly string[])[], rankConst = 1): string[] {
  const scores = new Map<string, number>();
  for (const ranking of rankings) {
    const seen = new Set<string>();
    ranking.forEach((uuid, rank) => {
      if (seen.has(uuid)) return;
      seen.add(uuid);
      scores.set(uuid, (scores.get(uuid) ?? 0) + 1 / (rank + rankConst));
    });
  }
  return [...scores.entries()].sort((a, b) => b[1] - a[1]).map(([uuid]) => uuid);
}

/**
 * Order facts by graph distance between the center node and the nearer of
 * their endpoints. Unknown distances sort last; equal distances keep input order.
 */
export function rerankByNodeDistance(
  edges: readonly EntityEdge[],
  centerNodeUuid: string,
  distances: ReadonlyMap<string, number>,
): EntityEdge[] {
  const distanceOf = (uuid: string): number =>
    uuid === centerNodeUuid ? 0 : distances.get(uuid) ?? Number.POSITIVE_INFINITY;

  return edges
    .map((edge, index) => ({
      edge,
      index,
      distance: Math.min(distanceOf(edge.sourceNodeUuid), distanceOf(edge.targetNodeUuid)),
    }))
    .sort((a, b) => {
      if (a.distance !== b.distance) return a.distance < b.distance ? -1 : 1;
      return a.index - b.index;
    })
    .map(({ edge }) => edge);
}

export function endpointUuids(edges: readonly EntityEdge[]): string[] {
  const uuids = new Set<string>();
  for (const edge of edges) {
    uuids.add(edge.sourceNodeUuid);
    uuids.add(edge.targetNodeUuid);
  }
  return [...uuids];
}
