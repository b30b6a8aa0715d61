import type { EntityEdge, EntityNode } from "@episode-graph/graph-db";

export type WriteLine = (line: string) => void;

const SUMMARY_PREVIEW_LENGTH = 100;

export function formatFact(edge: EntityEdge): string[] {
  const lines = [`UUID: ${edge.uuid}`, `Fact: ${edge.fact}`];
  if (edge.validAt) lines.push(`Valid from: ${edge.validAt.toISOString()}`);
  if (edge.invalidAt) lines.push(`Valid until: ${edge.invalidAt.toISOString()}`);
  lines.push("---");
  return lines;
}

export function truncateSummary(summary: string): string {
  return summary.length > SUMMARY_PREVIEW_LENGTH ? `${summary.slice(0, SUMMARY_PREVIEW_LENGTH)}...` : summary;
}

export function formatNode(node: EntityNode): string[] {
  const lines = [
    `Node UUID: ${node.uuid}`,
    `Node Name: ${node.name}`,
    `Content Summary: ${truncateSummary(node.summary)}`,
    `Node Labels: ${node.labels.join(", ")}`,
    `Created At: ${node.createdAt.toISOString()}`,
  ];
  const attributes = Object.entries(node.attributes);
  if (attributes.length > 0) {
    lines.push("Attributes:");
    for (const [key, value] of attributes) lines.push(`  ${key}: ${String(value)}`);
  }
  lines.push("---");
  return lines;
}

export function writeLines(write: WriteLine, lines: string[]): void {
  for (const line of lines) write(line);
}
