import {
  describeError,
  NODE_HYBRID_SEARCH_RRF,
  withLimit,
  type IKnowledgeGraph,
  type ServiceLogger,
} from "@episode-graph/graph-db";
import { formatFact, formatNode, writeLines, type WriteLine } from "./format.js";

export const NODE_SEARCH_LIMIT = 5;

export type SearchStep = "facts" | "center" | "nodes";

export interface SearchReport {
  completed: SearchStep[];
  factResults: number;
  centerResults: number;
  nodeResults: number;
  aborted?: { step: SearchStep; reason: string };
}

export interface SearchQueries {
  factQuery: string;
  nodeQuery: string;
}

/**
 * Fact search, then the same query centered on the top result's source node,
 * then a node search. The first failing step ends the run.
 */
export async function runSearches(
  graph: Pick<IKnowledgeGraph, "search" | "searchNodes">,
  queries: SearchQueries,
  logger: ServiceLogger,
  write: WriteLine = console.log,
): Promise<SearchReport> {
  const report: SearchReport = { completed: [], factResults: 0, centerResults: 0, nodeResults: 0 };
  let step: SearchStep = "facts";

  try {
    write(`\nSearching for: '${queries.factQuery}'`);
    const results = await graph.search(queries.factQuery);
    report.factResults = results.length;
    write("\nSearch Results:");
    for (const edge of results) writeLines(write, formatFact(edge));
    report.completed.push(step);

    step = "center";
    const top = results[0];
    if (top) {
      write(`\nReranking search results based on graph distance from: ${top.sourceNodeUuid}`);
      const reranked = await graph.search(queries.factQuery, { centerNodeUuid: top.sourceNodeUuid });
      report.centerResults = reranked.length;
      write("\nReranked Search Results:");
      for (const edge of reranked) writeLines(write, formatFact(edge));
    } else {
      write("No results found in the initial search to use as center node.");
    }
    report.completed.push(step);

    step = "nodes";
    write(`\nPerforming node search for: '${queries.nodeQuery}'`);
    const nodes = await graph.searchNodes(queries.nodeQuery, withLimit(NODE_HYBRID_SEARCH_RRF, NODE_SEARCH_LIMIT));
    report.nodeResults = nodes.length;
    write("\nNode Search Results:");
    for (const node of nodes) writeLines(write, formatNode(node));
    report.completed.push(step);
  } catch (err) {
    const reason = describeError(err);
    logger.error({ step, err }, `Search step '${step}' failed, skipping remaining searches: ${reason}`);
    report.aborted = { step, reason };
  }

  return report;
}
