import {
  isRateLimitError,
  serializeEpisodeBody,
  type EpisodeInput,
  type IKnowledgeGraph,
  type ServiceLogger,
} from "@episode-graph/graph-db";
import { runWithRetry, sleep as timerSleep, type ErrorClassification, type RetryPolicy } from "@episode-graph/retry";
import { BILLING_URL } from "./config.js";
import type { ExampleEpisode } from "./episodes.js";
import type { WriteLine } from "./format.js";

export interface IngestOptions {
  prefix: string;
  policy: RetryPolicy;
  pacingMs: number;
  logger: ServiceLogger;
  write?: WriteLine;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
}

export interface IngestReport {
  added: number;
  failed: number;
  attempted: number;
}

export function classifyGraphError(error: unknown): ErrorClassification {
  return isRateLimitError(error) ? "rate_limited" : "other";
}

export function toEpisodeInput(item: ExampleEpisode, name: string, referenceTime: Date): EpisodeInput {
  return {
    name,
    episodeBody: serializeEpisodeBody(item.content, name),
    source: item.type,
    sourceDescription: item.description,
    referenceTime,
  };
}

/**
 * Add episodes one at a time through the retry coordinator. The first failure
 * ends the batch; items after it are never attempted.
 */
export async function ingestEpisodes(
  graph: Pick<IKnowledgeGraph, "addEpisode">,
  episodes: readonly ExampleEpisode[],
  options: IngestOptions,
): Promise<IngestReport> {
  const write = options.write ?? console.log;
  const wait = options.sleep ?? timerSleep;
  const clock = options.clock ?? (() => new Date());
  const report: IngestReport = { added: 0, failed: 0, attempted: 0 };

  for (const [index, item] of episodes.entries()) {
    const name = `${options.prefix} ${index}`;
    const referenceTime = clock();
    report.attempted++;

    // Serialization runs inside the operation so bad content counts as a failed item.
    const outcome = await runWithRetry(async () => graph.addEpisode(toEpisodeInput(item, name, referenceTime)), {
      name,
      policy: options.policy,
      classifyError: classifyGraphError,
      logger: options.logger,
      sleep: wait,
    });

    if (!outcome.success) {
      report.failed++;
      write(`✗ Failed to add episode: ${name}`);
      if (outcome.failure === "rate_limited") {
        options.logger.error(
          { episode: name, billingUrl: BILLING_URL },
          `Rate limits persisted for ${name}. Check the plan and usage limits at ${BILLING_URL}`,
        );
      }
      break;
    }

    report.added++;
    write(`✓ Added episode: ${name} (${item.type})`);
    if (index < episodes.length - 1) await wait(options.pacingMs);
  }

  return report;
}
