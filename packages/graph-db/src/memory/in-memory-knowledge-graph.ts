import { v4 as uuidv4 } from "uuid";
import { parseEpisodeContent } from "../episode.js";
import type { IEntityExtractor } from "../extraction/types.js";
import { buildGraphElements, mergeEntity, normalizeName, remapEdgeEndpoints } from "../graph-builder.js";
import { hybridEdgeSearch, hybridNodeSearch, MAX_CENTER_DISTANCE, type SearchBackend } from "../search/hybrid.js";
import { keywordRank } from "../search/keywords.js";
import { EDGE_HYBRID_SEARCH_NODE_DISTANCE, EDGE_HYBRID_SEARCH_RRF, withLimit } from "../search/recipes.js";
import type { AddEpisodeResult, EntityEdge, EntityNode, EpisodeInput, EpisodicNode } from "../types/graph.js";
import type { KnowledgeGraphOptions } from "../types/options.js";
import type { IKnowledgeGraph } from "../types/repository.js";
import type { EdgeSearchMethod, NodeSearchConfig, NodeSearchMethod, SearchOptions } from "../types/search.js";

export class InMemoryKnowledgeGraph implements IKnowledgeGraph, SearchBackend {
  private episodes = new Map<string, EpisodicNode>();
  private nodes = new Map<string, EntityNode>();
  private edges = new Map<string, EntityEdge>();

  private readonly groupId: string;
  private readonly newUuid: () => string;
  private readonly clock: () => Date;

  constructor(
    private readonly extractor: IEntityExtractor,
    options: KnowledgeGraphOptions = {},
  ) {
    this.groupId = options.groupId ?? "default";
    this.newUuid = options.newUuid ?? uuidv4;
    this.clock = options.clock ?? (() => new Date());
  }

  async connect(): Promise<void> {
    // no-op for in-memory
  }

  async buildIndicesAndConstraints(): Promise<void> {
    // no-op for in-memory
  }

  async disconnect(): Promise<void> {
    this.episodes.clear();
    this.nodes.clear();
    this.edges.clear();
  }

  async addEpisode(input: EpisodeInput): Promise<AddEpisodeResult> {
    const content = parseEpisodeContent(input);
    const now = this.clock();
    const episode: EpisodicNode = {
      uuid: this.newUuid(),
      name: input.name,
      content: input.episodeBody,
      source: input.source,
      sourceDescription: input.sourceDescription,
      validAt: input.referenceTime ?? now,
      createdAt: now,
      groupId: this.groupId,
    };

    const extracted = await this.extractor.extract({
      name: episode.name,
      content,
      source: episode.source,
      sourceDescription: episode.sourceDescription,
      referenceTime: episode.validAt,
    });
    const candidates = buildGraphElements(episode, extracted, this.newUuid, now);

    const resolved = new Map<string, string>();
    const nodes = candidates.nodes.map((candidate) => {
      const existing = this.findEntityByName(candidate.name);
      const stored = existing ? mergeEntity(existing, candidate) : candidate;
      this.nodes.set(stored.uuid, stored);
      resolved.set(candidate.uuid, stored.uuid);
      return stored;
    });

    const edges = remapEdgeEndpoints(candidates.edges, resolved);
    for (const edge of edges) this.edges.set(edge.uuid, edge);
    this.episodes.set(episode.uuid, episode);

    return { episode, nodes, edges };
  }

  async getEpisode(uuid: string): Promise<EpisodicNode | null> {
    return this.episodes.get(uuid) ?? null;
  }

  async search(query: string, options: SearchOptions = {}): Promise<EntityEdge[]> {
    const recipe = options.centerNodeUuid ? EDGE_HYBRID_SEARCH_NODE_DISTANCE : EDGE_HYBRID_SEARCH_RRF;
    const config = options.limit === undefined ? recipe : withLimit(recipe, options.limit);
    return hybridEdgeSearch(this, query, config, options.centerNodeUuid);
  }

  async searchNodes(query: string, config: NodeSearchConfig): Promise<EntityNode[]> {
    return hybridNodeSearch(this, query, config);
  }

  // Search backend primitives

  async edgeCandidates(method: EdgeSearchMethod, query: string, limit: number): Promise<EntityEdge[]> {
    if (method === "fulltext") {
      return keywordRank(query, [...this.edges.values()], (e) => `${e.name} ${e.fact}`).slice(0, limit);
    }

    const matchedNodes = keywordRank(query, [...this.nodes.values()], (n) => `${n.name} ${n.summary}`);
    const collected = new Map<string, EntityEdge>();
    for (const node of matchedNodes) {
      for (const edge of this.edgesOf(node.uuid)) collected.set(edge.uuid, edge);
    }
    return [...collected.values()].slice(0, limit);
  }

  async nodeCandidates(method: NodeSearchMethod, query: string, limit: number): Promise<EntityNode[]> {
    if (method === "fulltext") {
      return keywordRank(query, [...this.nodes.values()], (n) => `${n.name} ${n.summary}`).slice(0, limit);
    }

    const matchedEdges = keywordRank(query, [...this.edges.values()], (e) => `${e.name} ${e.fact}`);
    const collected = new Map<string, EntityNode>();
    for (const edge of matchedEdges) {
      for (const uuid of [edge.sourceNodeUuid, edge.targetNodeUuid]) {
        const node = this.nodes.get(uuid);
        if (node) collected.set(node.uuid, node);
      }
    }
    return [...collected.values()].slice(0, limit);
  }

  async nodeDistances(centerNodeUuid: string, nodeUuids: string[]): Promise<Map<string, number>> {
    const wanted = new Set(nodeUuids);
    const distances = new Map<string, number>();
    const visited = new Set<string>([centerNodeUuid]);
    let frontier = [centerNodeUuid];

    for (let depth = 1; depth <= MAX_CENTER_DISTANCE && frontier.length > 0; depth++) {
      const next: string[] = [];
      for (const uuid of frontier) {
        for (const edge of this.edgesOf(uuid)) {
          const neighbor = edge.sourceNodeUuid === uuid ? edge.targetNodeUuid : edge.sourceNodeUuid;
          if (visited.has(neighbor)) continue;
          visited.add(neighbor);
          if (wanted.has(neighbor)) distances.set(neighbor, depth);
          next.push(neighbor);
        }
      }
      frontier = next;
    }
    return distances;
  }

  private edgesOf(nodeUuid: string): EntityEdge[] {
    return [...this.edges.values()].filter(
      (e) => e.sourceNodeUuid === nodeUuid || e.targetNodeUuid === nodeUuid,
    );
  }

  private findEntityByName(name: string): EntityNode | undefined {
    const key = normalizeName(name);
    for (const node of this.nodes.values()) {
      if (node.groupId === this.groupId && normalizeName(node.name) === key) return node;
    }
    return undefined;
  }
}
