import type { EpisodeContent, EpisodeType } from "../types/graph.js";
import type { ExtractedGraph } from "./schema.js";

export interface EpisodeContext {
  name: string;
  content: EpisodeContent;
  source: EpisodeType;
  sourceDescription: string;
  referenceTime: Date;
}

export interface IEntityExtractor {
  extract(context: EpisodeContext): Promise<ExtractedGraph>;
}

export interface GenerateOptions {
  system?: string;
  maxTokens?: number;
}

/** Minimal text-completion surface the extractor needs from a model provider. */
export interface LlmClient {
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}
