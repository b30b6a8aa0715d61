import neo4j, { type Driver, type Session } from "neo4j-driver";
import { v4 as uuidv4 } from "uuid";
import { parseEpisodeContent } from "../episode.js";
import type { IEntityExtractor } from "../extraction/types.js";
import { buildGraphElements, normalizeName, remapEdgeEndpoints } from "../graph-builder.js";
import { createServiceLogger, type ServiceLogger } from "../logging/logger-factory.js";
import { hybridEdgeSearch, hybridNodeSearch, type SearchBackend } from "../search/hybrid.js";
import { luceneSanitize } from "../search/lucene.js";
import { EDGE_HYBRID_SEARCH_NODE_DISTANCE, EDGE_HYBRID_SEARCH_RRF, withLimit } from "../search/recipes.js";
import type { AddEpisodeResult, EntityEdge, EntityNode, EpisodeInput, EpisodicNode } from "../types/graph.js";
import type { KnowledgeGraphOptions } from "../types/options.js";
import type { IKnowledgeGraph } from "../types/repository.js";
import type { EdgeSearchMethod, NodeSearchConfig, NodeSearchMethod, SearchOptions } from "../types/search.js";
import { createDriver, type Neo4jConfig } from "./connection.js";
import {
  encodeAttributes,
  rowToEdge,
  rowToEpisode,
  rowToNode,
  toIso,
  type DistanceRow,
  type EdgeRow,
  type EpisodeRow,
  type NodeRow,
} from "./mappers.js";
import { CREATE_EPISODE, CREATE_FACT, GET_EPISODE, MERGE_ENTITY } from "./queries/episodes.js";
import { INDEX_STATEMENTS } from "./queries/indices.js";
import {
  EDGE_FULLTEXT_SEARCH,
  EDGE_GRAPH_SEARCH,
  NODE_DISTANCES,
  NODE_FULLTEXT_SEARCH,
  NODE_GRAPH_SEARCH,
} from "./queries/search.js";

export class Neo4jKnowledgeGraph implements IKnowledgeGraph, SearchBackend {
  private driver: Driver | null = null;

  private readonly groupId: string;
  private readonly newUuid: () => string;
  private readonly clock: () => Date;
  private readonly logger: ServiceLogger;

  constructor(
    private readonly config: Neo4jConfig,
    private readonly extractor: IEntityExtractor,
    options: KnowledgeGraphOptions = {},
  ) {
    this.groupId = options.groupId ?? "default";
    this.newUuid = options.newUuid ?? uuidv4;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createServiceLogger("Neo4jKnowledgeGraph");
  }

  async connect(): Promise<void> {
    this.driver = createDriver(this.config);
    await this.driver.verifyConnectivity();
    this.logger.info({ uri: this.config.uri }, "Connected to Neo4j");
  }

  async disconnect(): Promise<void> {
    await this.driver?.close();
    this.driver = null;
  }

  private openSession(): Session {
    if (!this.driver) throw new Error("Not connected. Call connect() first.");
    return this.driver.session({ database: this.config.database });
  }

  async buildIndicesAndConstraints(): Promise<void> {
    const session = this.openSession();
    try {
      for (const statement of INDEX_STATEMENTS) {
        await session.run(statement);
      }
      this.logger.debug({ statements: INDEX_STATEMENTS.length }, "Indices and constraints ready");
    } finally {
      await session.close();
    }
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

    // Extraction runs before any write so a throttled attempt leaves nothing behind.
    const extracted = await this.extractor.extract({
      name: episode.name,
      content,
      source: episode.source,
      sourceDescription: episode.sourceDescription,
      referenceTime: episode.validAt,
    });
    const candidates = buildGraphElements(episode, extracted, this.newUuid, now);

    const session = this.openSession();
    try {
      const result = await session.executeWrite(async (tx) => {
        await tx.run(CREATE_EPISODE, {
          uuid: episode.uuid,
          name: episode.name,
          content: episode.content,
          source: episode.source,
          sourceDescription: episode.sourceDescription,
          validAt: episode.validAt.toISOString(),
          createdAt: episode.createdAt.toISOString(),
          groupId: episode.groupId,
        });

        const resolved = new Map<string, string>();
        const nodes: EntityNode[] = [];
        for (const candidate of candidates.nodes) {
          const merged = await tx.run<NodeRow>(MERGE_ENTITY, {
            nameKey: normalizeName(candidate.name),
            groupId: candidate.groupId,
            uuid: candidate.uuid,
            name: candidate.name,
            createdAt: candidate.createdAt.toISOString(),
            labels: candidate.labels,
            summary: candidate.summary,
            attributes: encodeAttributes(candidate.attributes),
            episodeUuid: episode.uuid,
          });
          const record = merged.records[0];
          if (!record) throw new Error(`Entity merge returned no row for ${candidate.name}`);
          const node = rowToNode(record.toObject());
          resolved.set(candidate.uuid, node.uuid);
          nodes.push(node);
        }

        const edges = remapEdgeEndpoints(candidates.edges, resolved);
        for (const edge of edges) {
          await tx.run(CREATE_FACT, {
            uuid: edge.uuid,
            sourceNodeUuid: edge.sourceNodeUuid,
            targetNodeUuid: edge.targetNodeUuid,
            name: edge.name,
            fact: edge.fact,
            episodes: edge.episodes,
            validAt: toIso(edge.validAt),
            invalidAt: toIso(edge.invalidAt),
            createdAt: edge.createdAt.toISOString(),
            groupId: edge.groupId,
          });
        }
        return { episode, nodes, edges };
      });

      this.logger.debug(
        {
          episode: episode.name,
          nodes: result.nodes.length,
          edges: result.edges.length,
          droppedFacts: candidates.droppedFacts,
        },
        "Episode stored",
      );
      return result;
    } finally {
      await session.close();
    }
  }

  async getEpisode(uuid: string): Promise<EpisodicNode | null> {
    const session = this.openSession();
    try {
      const result = await session.run<EpisodeRow>(GET_EPISODE, { uuid });
      const record = result.records[0];
      if (!record) return null;
      return rowToEpisode(record.toObject());
    } finally {
      await session.close();
    }
  }

  async search(query: string, options: SearchOptions = {}): Promise<EntityEdge[]> {
    const recipe = options.centerNodeUuid ? EDGE_HYBRID_SEARCH_NODE_DISTANCE : EDGE_HYBRID_SEARCH_RRF;
    const config = options.limit === undefined ? recipe : withLimit(recipe, options.limit);
    return hybridEdgeSearch(this, query, config, options.centerNodeUuid);
  }

  async searchNodes(query: string, config: NodeSearchConfig): Promise<EntityNode[]> {
    return hybridNodeSearch(this, query, config);
  }

  // Search backend primitives: Lucene full-text indexes plus Cypher traversal

  async edgeCandidates(method: EdgeSearchMethod, query: string, limit: number): Promise<EntityEdge[]> {
    const sanitized = luceneSanitize(query);
    if (!sanitized.trim()) return [];

    const session = this.openSession();
    try {
      const result = await session.run<EdgeRow>(method === "fulltext" ? EDGE_FULLTEXT_SEARCH : EDGE_GRAPH_SEARCH, {
        query: sanitized,
        limit: neo4j.int(limit),
        groupId: this.groupId,
      });
      return result.records.map((r) => rowToEdge(r.toObject()));
    } finally {
      await session.close();
    }
  }

  async nodeCandidates(method: NodeSearchMethod, query: string, limit: number): Promise<EntityNode[]> {
    const sanitized = luceneSanitize(query);
    if (!sanitized.trim()) return [];

    const session = this.openSession();
    try {
      const result = await session.run<NodeRow>(method === "fulltext" ? NODE_FULLTEXT_SEARCH : NODE_GRAPH_SEARCH, {
        query: sanitized,
        limit: neo4j.int(limit),
        groupId: this.groupId,
      });
      return result.records.map((r) => rowToNode(r.toObject()));
    } finally {
      await session.close();
    }
  }

  async nodeDistances(centerNodeUuid: string, nodeUuids: string[]): Promise<Map<string, number>> {
    if (nodeUuids.length === 0) return new Map();

    const session = this.openSession();
    try {
      const result = await session.run<DistanceRow>(NODE_DISTANCES, { centerNodeUuid, nodeUuids });
      return new Map(result.records.map((r): [string, number] => [r.get("uuid"), r.get("distance")]));
    } finally {
      await session.close();
    }
  }
}
