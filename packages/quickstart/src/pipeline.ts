import { describeError, type IKnowledgeGraph, type ServiceLogger } from "@episode-graph/graph-db";
import type { RetryPolicy } from "@episode-graph/retry";
import type { ExampleEpisode } from "./episodes.js";
import type { WriteLine } from "./format.js";
import { ingestEpisodes, type IngestReport } from "./ingest.js";
import { runSearches, type SearchQueries, type SearchReport } from "./search.js";

export interface QuickstartOptions {
  episodes: readonly ExampleEpisode[];
  prefix: string;
  queries: SearchQueries;
  policy: RetryPolicy;
  pacingMs: number;
  logger: ServiceLogger;
  write?: WriteLine;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
}

export interface QuickstartReport {
  ingest: IngestReport;
  search?: SearchReport;
}

/** Connect, prepare indices, ingest, search when something was added; always disconnect. */
export async function runQuickstart(graph: IKnowledgeGraph, options: QuickstartOptions): Promise<QuickstartReport> {
  const write = options.write ?? console.log;
  try {
    await graph.connect();
    await graph.buildIndicesAndConstraints();

    const ingest = await ingestEpisodes(graph, options.episodes, {
      prefix: options.prefix,
      policy: options.policy,
      pacingMs: options.pacingMs,
      logger: options.logger,
      write,
      sleep: options.sleep,
      clock: options.clock,
    });
    write(`\nAdded ${ingest.added} of ${options.episodes.length} episodes`);

    if (ingest.added === 0) {
      options.logger.warn({}, "No episodes were added; skipping searches");
      return { ingest };
    }
    const search = await runSearches(graph, options.queries, options.logger, write);
    return { ingest, search };
  } finally {
    try {
      await graph.disconnect();
    } catch (err) {
      options.logger.error({ err }, `Failed to close the graph connection: ${describeError(err)}`);
    }
    write("\nConnection closed");
  }
}
