import type { ExtractedGraph } from "./extraction/schema.js";
import type { EntityEdge, EntityNode, EpisodicNode } from "./types/graph.js";

export const ENTITY_LABEL = "Entity";

export function normalizeName(name: string): string {
  return name.trim().replace(/\s+/g, " ").toLowerCase();
}

/** "previously worked in" -> "PREVIOUSLY_WORKED_IN" */
export function toRelationName(relation: string): string {
  return relation
    .trim()
    .replace(/[^A-Za-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .toUpperCase();
}

export function parseTimestamp(value: string | null): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function mergeLabels(existing: string[], incoming: string[]): string[] {
  const labels = [...existing];
  for (const label of incoming) {
    if (!labels.includes(label)) labels.push(label);
  }
  return labels;
}

/**
 * Fold a freshly extracted entity into the stored one with the same name.
 * Identity and creation time stay; labels union; the latest non-empty summary
 * and attribute set win.
 */
export function mergeEntity(existing: EntityNode, incoming: EntityNode): EntityNode {
  return {
    ...existing,
    labels: mergeLabels(existing.labels, incoming.labels),
    summary: incoming.summary !== "" ? incoming.summary : existing.summary,
    attributes: Object.keys(incoming.attributes).length > 0 ? { ...incoming.attributes } : existing.attributes,
  };
}

export interface GraphElements {
  nodes: EntityNode[];
  edges: EntityEdge[];
  droppedFacts: number;
}

/**
 * Turn one episode's extraction into candidate nodes and edges. Entities that
 * share a normalized name collapse into one node; facts naming an unknown
 * entity are dropped.
 */
export function buildGraphElements(
  episode: EpisodicNode,
  extracted: ExtractedGraph,
  newUuid: () => string,
  now: Date,
): GraphElements {
  const byName = new Map<string, EntityNode>();

  for (const entity of extracted.entities) {
    const key = normalizeName(entity.name);
    const candidate: EntityNode = {
      uuid: newUuid(),
      name: entity.name.trim(),
      summary: entity.summary.trim(),
      labels: mergeLabels([ENTITY_LABEL], entity.labels),
      createdAt: now,
      attributes: { ...entity.attributes },
      groupId: episode.groupId,
    };
    const seen = byName.get(key);
    byName.set(key, seen ? mergeEntity(seen, candidate) : candidate);
  }

  const edges: EntityEdge[] = [];
  let droppedFacts = 0;
  for (const fact of extracted.facts) {
    const source = byName.get(normalizeName(fact.source));
    const target = byName.get(normalizeName(fact.target));
    if (!source || !target) {
      droppedFacts++;
      continue;
    }
    edges.push({
      uuid: newUuid(),
      name: toRelationName(fact.relation),
      fact: fact.fact.trim(),
      sourceNodeUuid: source.uuid,
      targetNodeUuid: target.uuid,
      episodes: [episode.uuid],
      validAt: parseTimestamp(fact.validAt),
      invalidAt: parseTimestamp(fact.invalidAt),
      createdAt: now,
      groupId: episode.groupId,
    });
  }

  return { nodes: [...byName.values()], edges, droppedFacts };
}

/** Point edges at the uuids their endpoints resolved to in storage. */
export function remapEdgeEndpoints(edges: EntityEdge[], resolved: Map<string, string>): EntityEdge[] {
  return edges.map((edge) => ({
    ...edge,
    sourceNodeUuid: resolved.get(edge.sourceNodeUuid) ?? edge.sourceNodeUuid,
    targetNodeUuid: resolved.get(edge.targetNodeUuid) ?? edge.targetNodeUuid,
  }));
}
