import { describe, it, expect, vi } from "vitest";
import { InMemoryKnowledgeGraph, RateLimitError, type ExtractedGraph, type IKnowledgeGraph } from "@episode-graph/graph-db";
import { createRetryPolicy } from "@episode-graph/retry";
import type { ExampleEpisode } from "../episodes.js";
import { runQuickstart } from "../pipeline.js";
import { FIXED_TIME, recordingSleep, sequentialUuids, TableExtractor, testLogger } from "./fixtures.js";

const episodes: ExampleEpisode[] = [
  { content: "Mira Okafor was harbor master of Port Alder.", type: "text", description: "gazette" },
  { content: { name: "Tomas Reyes", role: "deputy", town: "Port Alder" }, type: "json", description: "registry" },
];

const extractions: Record<string, ExtractedGraph> = {
  "Test 0": {
    entities: [
      { name: "Mira Okafor", labels: ["Person"], summary: "Harbor master of Port Alder", attributes: {} },
      { name: "Port Alder", labels: ["Town"], summary: "A harbor town", attributes: {} },
    ],
    facts: [
      {
        source: "Mira Okafor",
        target: "Port Alder",
        relation: "harbor master of",
        fact: "Mira Okafor was harbor master of Port Alder",
        validAt: null,
        invalidAt: null,
      },
    ],
  },
  "Test 1": {
    entities: [
      { name: "Tomas Reyes", labels: ["Person"], summary: "Deputy harbor master", attributes: { role: "deputy" } },
      { name: "port alder", labels: [], summary: "", attributes: {} },
    ],
    facts: [
      {
        source: "Tomas Reyes",
        target: "port alder",
        relation: "deputy in",
        fact: "Tomas Reyes served as deputy in Port Alder",
        validAt: null,
        invalidAt: null,
      },
    ],
  },
};

function baseOptions(lines: string[]) {
  const { sleep } = recordingSleep();
  return {
    episodes,
    prefix: "Test",
    queries: { factQuery: "harbor master", nodeQuery: "Port Alder" },
    policy: createRetryPolicy(),
    pacingMs: 1000,
    logger: testLogger,
    write: (line: string) => lines.push(line),
    sleep,
    clock: () => FIXED_TIME,
  };
}

describe("runQuickstart", () => {
  it("ingests, searches and closes the connection", async () => {
    const graph = new InMemoryKnowledgeGraph(new TableExtractor(extractions), {
      groupId: "test",
      newUuid: sequentialUuids(),
      clock: () => FIXED_TIME,
    });
    const disconnect = vi.spyOn(graph, "disconnect");
    const lines: string[] = [];

    const report = await runQuickstart(graph, baseOptions(lines));

    expect(report).toEqual({
      ingest: { added: 2, failed: 0, attempted: 2 },
      search: { completed: ["facts", "center", "nodes"], factResults: 2, centerResults: 2, nodeResults: 3 },
    });
    expect(lines).toContain("\nReranking search results based on graph distance from: id-2");
    expect(lines).toContain("Node Name: Port Alder");
    expect(lines.at(-1)).toBe("\nConnection closed");
    expect(disconnect).toHaveBeenCalledTimes(1);
  });

  it("skips searches when no episode was added", async () => {
    const search = vi.fn<IKnowledgeGraph["search"]>(async () => []);
    const graph: IKnowledgeGraph = {
      connect: vi.fn(async () => undefined),
      buildIndicesAndConstraints: vi.fn(async () => undefined),
      disconnect: vi.fn(async () => undefined),
      addEpisode: vi.fn(async () => {
        throw new RateLimitError("slow down");
      }),
      getEpisode: vi.fn(async () => null),
      search,
      searchNodes: vi.fn(async () => []),
    };
    const lines: string[] = [];

    const report = await runQuickstart(graph, baseOptions(lines));

    expect(report).toEqual({ ingest: { added: 0, failed: 1, attempted: 1 } });
    expect(search).not.toHaveBeenCalled();
    expect(graph.disconnect).toHaveBeenCalledTimes(1);
  });

  it("disconnects when connecting fails", async () => {
    const disconnect = vi.fn(async () => undefined);
    const graph: IKnowledgeGraph = {
      connect: vi.fn(async () => {
        throw new Error("ServiceUnavailable");
      }),
      buildIndicesAndConstraints: vi.fn(async () => undefined),
      disconnect,
      addEpisode: vi.fn(async () => {
        throw new Error("unreachable");
      }),
      getEpisode: vi.fn(async () => null),
      search: vi.fn(async () => []),
      searchNodes: vi.fn(async () => []),
    };
    const lines: string[] = [];

    await expect(runQuickstart(graph, baseOptions(lines))).rejects.toThrow("ServiceUnavailable");
    expect(disconnect).toHaveBeenCalledTimes(1);
    expect(lines).toEqual(["\nConnection closed"]);
  });

  it("reports the connection as closed even when disconnect fails", async () => {
    const graph = new InMemoryKnowledgeGraph(new TableExtractor(extractions), {
      groupId: "test",
      newUuid: sequentialUuids(),
      clock: () => FIXED_TIME,
    });
    vi.spyOn(graph, "disconnect").mockRejectedValue(new Error("socket closed"));
    const errorSpy = vi.spyOn(testLogger, "error");
    const lines: string[] = [];

    const report = await runQuickstart(graph, baseOptions(lines));

    expect(report.ingest).toEqual({ added: 2, failed: 0, attempted: 2 });
    expect(lines.at(-1)).toBe("\nConnection closed");
    expect(errorSpy).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error) }),
      "Failed to close the graph connection: Error: socket closed",
    );
    errorSpy.mockRestore();
  });

  it("keeps the original error when both connect and disconnect fail", async () => {
    const graph: IKnowledgeGraph = {
      connect: vi.fn(async () => {
        throw new Error("ServiceUnavailable");
      }),
      buildIndicesAndConstraints: vi.fn(async () => undefined),
      disconnect: vi.fn(async () => {
        throw new Error("socket closed");
      }),
      addEpisode: vi.fn(async () => {
        throw new Error("unreachable");
      }),
      getEpisode: vi.fn(async () => null),
      search: vi.fn(async () => []),
      searchNodes: vi.fn(async () => []),
    };
    const lines: string[] = [];

    await expect(runQuickstart(graph, baseOptions(lines))).rejects.toThrow("ServiceUnavailable");
    expect(lines).toEqual(["\nConnection closed"]);
  });
});
