export type EpisodeType = "text" | "json";

export type AttributeValue = string | number | boolean;

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/** Free text, or a record that survives a JSON round trip unchanged. */
export type EpisodeContent = string | JsonObject;

export interface EpisodeInput {
  name: string;
  episodeBody: string;
  source: EpisodeType;
  sourceDescription: string;
  referenceTime?: Date;
}

export interface EpisodicNode {
  uuid: string;
  name: string;
  content: string;
  source: EpisodeType;
  sourceDescription: string;
  validAt: Date;   // reference time of the episode
  createdAt: Date;
  groupId: string;
}

export interface EntityNode {
  uuid: string;
  name: string;
  summary: string;
  labels: string[];
  createdAt: Date;
  attributes: Record<string, AttributeValue>;
  groupId: string;
}

export interface EntityEdge {
  uuid: string;
  name: string;
  fact: string;
  sourceNodeUuid: string;
  targetNodeUuid: string;
  episodes: string[];
  validAt: Date | null;
  invalidAt: Date | null;
  createdAt: Date;
  groupId: string;
}

export interface AddEpisodeResult {
  episode: EpisodicNode;
  nodes: EntityNode[];
  edges: EntityEdge[];
}
