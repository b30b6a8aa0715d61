import type { AttributeValue, EntityEdge, EntityNode, EpisodeType, EpisodicNode } from "../types/graph.js";

// Timestamps are stored as ISO strings and attributes as a JSON string,
// since Neo4j properties cannot hold nested maps.

export type EpisodeRow = {
  uuid: string;
  name: string;
  content: string;
  source: string;
  sourceDescription: string;
  validAt: string;
  createdAt: string;
  groupId: string;
};

export type NodeRow = {
  uuid: string;
  name: string;
  summary: string | null;
  labels: string[] | null;
  createdAt: string;
  attributes: string | null;
  groupId: string;
};

export type EdgeRow = {
  uuid: string;
  name: string;
  fact: string;
  sourceNodeUuid: string;
  targetNodeUuid: string;
  episodes: string[] | null;
  validAt: string | null;
  invalidAt: string | null;
  createdAt: string;
  groupId: string;
};

export type DistanceRow = {
  uuid: string;
  distance: number;
};

function toEpisodeType(source: string): EpisodeType {
  return source === "json" ? "json" : "text";
}

function isAttributeValue(value: unknown): value is AttributeValue {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

export function decodeAttributes(raw: string | null): Record<string, AttributeValue> {
  if (!raw) return {};
  const decoded: unknown = JSON.parse(raw);
  if (typeof decoded !== "object" || decoded === null) return {};

  const attributes: Record<string, AttributeValue> = {};
  for (const [key, value] of Object.entries(decoded)) {
    if (isAttributeValue(value)) attributes[key] = value;
  }
  return attributes;
}

export function encodeAttributes(attributes: Record<string, AttributeValue>): string {
  return JSON.stringify(attributes);
}

export function toIso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export function rowToEpisode(row: EpisodeRow): EpisodicNode {
  return {
    uuid: row.uuid,
    name: row.name,
    content: row.content,
    source: toEpisodeType(row.source),
    sourceDescription: row.sourceDescription,
    validAt: new Date(row.validAt),
    createdAt: new Date(row.createdAt),
    groupId: row.groupId,
  };
}

export function rowToNode(row: NodeRow): EntityNode {
  return {
    uuid: row.uuid,
    name: row.name,
    summary: row.summary ?? "",
    labels: row.labels ?? [],
    createdAt: new Date(row.createdAt),
    attributes: decodeAttributes(row.attributes),
    groupId: row.groupId,
  };
}

export function rowToEdge(row: EdgeRow): EntityEdge {
  return {
    uuid: row.uuid,
    name: row.name,
    fact: row.fact,
    sourceNodeUuid: row.sourceNodeUuid,
    targetNodeUuid: row.targetNodeUuid,
    episodes: row.episodes ?? [],
    validAt: row.validAt ? new Date(row.validAt) : null,
    invalidAt: row.invalidAt ? new Date(row.invalidAt) : null,
    createdAt: new Date(row.createdAt),
    groupId: row.groupId,
  };
}
