export { AnthropicLlmClient, DEFAULT_ANTHROPIC_MODEL, toGraphError } from "./anthropic-client.js";
export type { AnthropicLlmConfig } from "./anthropic-client.js";
export { LlmEntityExtractor, parseExtraction } from "./llm-extractor.js";
export { buildExtractionPrompt, EXTRACTION_SYSTEM_PROMPT } from "./prompt.js";
export type { ExtractedEntity, ExtractedFact, ExtractedGraph } from "./schema.js";
export type { EpisodeContext, GenerateOptions, IEntityExtractor, LlmClient } from "./types.js";
