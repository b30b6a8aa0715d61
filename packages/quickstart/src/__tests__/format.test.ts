import { describe, it, expect } from "vitest";
import type { EntityEdge, EntityNode } from "@episode-graph/graph-db";
import { formatFact, formatNode, truncateSummary } from "../format.js";
import { FIXED_TIME } from "./fixtures.js";

const fact: EntityEdge = {
  uuid: "e-1",
  name: "HARBOR_MASTER_OF",
  fact: "Mira Okafor was harbor master of Port Alder",
  sourceNodeUuid: "n-1",
  targetNodeUuid: "n-2",
  episodes: ["ep-1"],
  validAt: new Date("2019-03-01T00:00:00.000Z"),
  invalidAt: null,
  createdAt: FIXED_TIME,
  groupId: "test",
};

describe("formatFact", () => {
  it("prints validity bounds only when present", () => {
    expect(formatFact(fact)).toEqual([
      "UUID: e-1",
      "Fact: Mira Okafor was harbor master of Port Alder",
      "Valid from: 2019-03-01T00:00:00.000Z",
      "---",
    ]);
    expect(formatFact({ ...fact, validAt: null, invalidAt: new Date("2024-06-30T00:00:00.000Z") })).toEqual([
      "UUID: e-1",
      "Fact: Mira Okafor was harbor master of Port Alder",
      "Valid until: 2024-06-30T00:00:00.000Z",
      "---",
    ]);
  });
});

describe("formatNode", () => {
  const node: EntityNode = {
    uuid: "n-2",
    name: "Port Alder",
    summary: "A harbor town",
    labels: ["Entity", "Town"],
    createdAt: FIXED_TIME,
    attributes: { population: 4200, coastal: true },
    groupId: "test",
  };

  it("lists labels and attributes", () => {
    expect(formatNode(node)).toEqual([
      "Node UUID: n-2",
      "Node Name: Port Alder",
      "Content Summary: A harbor town",
      "Node Labels: Entity, Town",
      "Created At: 2025-01-15T12:00:00.000Z",
      "Attributes:",
      "  population: 4200",
      "  coastal: true",
      "---",
    ]);
  });

  it("omits the attributes section when empty", () => {
    expect(formatNode({ ...node, attributes: {} })).not.toContain("Attributes:");
  });
});

describe("truncateSummary", () => {
  it("keeps short summaries intact", () => {
    expect(truncateSummary("x".repeat(100))).toBe("x".repeat(100));
  });

  it("cuts long summaries at 100 characters", () => {
    expect(truncateSummary("y".repeat(150))).toBe(`${"y".repeat(100)}...`);
  });
});
