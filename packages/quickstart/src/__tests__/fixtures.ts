import {
  createServiceLogger,
  type EpisodeContext,
  type ExtractedGraph,
  type IEntityExtractor,
} from "@episode-graph/graph-db";

export const testLogger = createServiceLogger("test");

export function recordingSleep() {
  const delays: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    delays.push(ms);
  };
  return { delays, sleep };
}

export function sequentialUuids(prefix = "id"): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

export const FIXED_TIME = new Date("2025-01-15T12:00:00.000Z");

/** Extractor that answers from a table keyed by episode name. */
export class TableExtractor implements IEntityExtractor {
  readonly calls: EpisodeContext[] = [];

  constructor(private readonly table: Record<string, ExtractedGraph>) {}

  async extract(context: EpisodeContext): Promise<ExtractedGraph> {
    this.calls.push(context);
    return this.table[context.name] ?? { entities: [], facts: [] };
  }
}
