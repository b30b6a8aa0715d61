import {
  AnthropicLlmClient,
  LlmEntityExtractor,
  Neo4jKnowledgeGraph,
  createServiceLogger,
  type IKnowledgeGraph,
  type ServiceLogger,
} from "@episode-graph/graph-db";
import { BILLING_URL, loadConfig, maskSecret, type QuickstartConfig } from "./config.js";
import { EPISODE_NAME_PREFIX, EXAMPLE_EPISODES, FACT_QUERY, NODE_QUERY } from "./episodes.js";
import { ConfigurationError } from "./errors.js";
import type { WriteLine } from "./format.js";
import { runQuickstart } from "./pipeline.js";

export interface QuickstartDeps {
  createGraph: (config: QuickstartConfig) => IKnowledgeGraph;
  logger: ServiceLogger;
  write?: WriteLine;
  sleep?: (ms: number) => Promise<void>;
}

export function createNeo4jGraph(config: QuickstartConfig): IKnowledgeGraph {
  const llm = new AnthropicLlmClient({ apiKey: config.anthropic.apiKey, model: config.anthropic.model });
  return new Neo4jKnowledgeGraph(config.neo4j, new LlmEntityExtractor(llm), {
    groupId: config.groupId,
    logger: createServiceLogger("Neo4jKnowledgeGraph"),
  });
}

/**
 * Load configuration from `env` and run the quickstart. Resolves to the process
 * exit code; configuration problems stop the run before any graph is created.
 */
export async function run(env: Record<string, string | undefined>, deps: QuickstartDeps): Promise<number> {
  const { logger } = deps;

  let config: QuickstartConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    logger.error({ variables: err.variables }, err.message);
    if (err.variables.includes("ANTHROPIC_API_KEY")) {
      logger.error({ billingUrl: BILLING_URL }, `Set ANTHROPIC_API_KEY; keys and billing are managed at ${BILLING_URL}`);
    }
    return 1;
  }

  logger.info(
    { apiKey: maskSecret(config.anthropic.apiKey), model: config.anthropic.model, uri: config.neo4j.uri },
    "Configuration loaded",
  );

  await runQuickstart(deps.createGraph(config), {
    episodes: EXAMPLE_EPISODES,
    prefix: EPISODE_NAME_PREFIX,
    queries: { factQuery: FACT_QUERY, nodeQuery: NODE_QUERY },
    policy: config.retryPolicy,
    pacingMs: config.pacingMs,
    logger,
    write: deps.write,
    sleep: deps.sleep,
  });
  return 0;
}
