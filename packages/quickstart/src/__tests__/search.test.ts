import { describe, it, expect, vi } from "vitest";
import {
  RateLimitError,
  type EntityEdge,
  type EntityNode,
  type NodeSearchConfig,
  type SearchOptions,
} from "@episode-graph/graph-db";
import { runSearches } from "../search.js";
import { FIXED_TIME, testLogger } from "./fixtures.js";

const queries = { factQuery: "harbor master", nodeQuery: "Port Alder" };

function edge(uuid: string, source: string, target: string): EntityEdge {
  return {
    uuid,
    name: "RELATES_TO",
    fact: `${source} relates to ${target}`,
    sourceNodeUuid: source,
    targetNodeUuid: target,
    episodes: ["ep-1"],
    validAt: null,
    invalidAt: null,
    createdAt: FIXED_TIME,
    groupId: "test",
  };
}

const node: EntityNode = {
  uuid: "n-1",
  name: "Port Alder",
  summary: "A harbor town",
  labels: ["Entity", "Town"],
  createdAt: FIXED_TIME,
  attributes: {},
  groupId: "test",
};

describe("runSearches", () => {
  it("centers the second search on the first result's source node", async () => {
    const search = vi.fn(async (_query: string, _options?: SearchOptions) => [edge("e-1", "n-7", "n-8"), edge("e-2", "n-1", "n-2")]);
    const searchNodes = vi.fn(async (_query: string, _config: NodeSearchConfig) => [node]);
    const lines: string[] = [];

    const report = await runSearches({ search, searchNodes }, queries, testLogger, (line) => lines.push(line));

    expect(search).toHaveBeenNthCalledWith(1, "harbor master");
    expect(search).toHaveBeenNthCalledWith(2, "harbor master", { centerNodeUuid: "n-7" });
    expect(searchNodes).toHaveBeenCalledWith("Port Alder", {
      methods: ["fulltext", "graph"],
      reranker: "rrf",
      limit: 5,
    });
    expect(report).toEqual({ completed: ["facts", "center", "nodes"], factResults: 2, centerResults: 2, nodeResults: 1 });
    expect(lines).toContain("Node Name: Port Alder");
  });

  it("skips the centered search when nothing matched", async () => {
    const search = vi.fn(async (_query: string, _options?: SearchOptions): Promise<EntityEdge[]> => []);
    const searchNodes = vi.fn(async (_query: string, _config: NodeSearchConfig): Promise<EntityNode[]> => []);
    const lines: string[] = [];

    const report = await runSearches({ search, searchNodes }, queries, testLogger, (line) => lines.push(line));

    expect(search).toHaveBeenCalledTimes(1);
    expect(searchNodes).toHaveBeenCalledTimes(1);
    expect(lines).toContain("No results found in the initial search to use as center node.");
    expect(report.completed).toEqual(["facts", "center", "nodes"]);
  });

  it("aborts the remaining steps on the first error", async () => {
    const search = vi.fn(async (_query: string, _options?: SearchOptions): Promise<EntityEdge[]> => {
      throw new RateLimitError("slow down");
    });
    const searchNodes = vi.fn(async (_query: string, _config: NodeSearchConfig): Promise<EntityNode[]> => [node]);

    const report = await runSearches({ search, searchNodes }, queries, testLogger, () => undefined);

    expect(searchNodes).not.toHaveBeenCalled();
    expect(report).toEqual({
      completed: [],
      factResults: 0,
      centerResults: 0,
      nodeResults: 0,
      aborted: { step: "facts", reason: "RateLimitError: slow down" },
    });
  });

  it("records which step failed", async () => {
    const search = vi.fn(async (_query: string, _options?: SearchOptions) => [edge("e-1", "n-1", "n-2")]);
    const searchNodes = vi.fn(async (_query: string, _config: NodeSearchConfig): Promise<EntityNode[]> => {
      throw new Error("index missing");
    });

    const report = await runSearches({ search, searchNodes }, queries, testLogger, () => undefined);

    expect(report.completed).toEqual(["facts", "center"]);
    expect(report.aborted).toEqual({ step: "nodes", reason: "Error: index missing" });
  });
});
