import { ExtractionError } from "../errors.js";
import { EXTRACTION_SYSTEM_PROMPT, buildExtractionPrompt } from "./prompt.js";
import { extractedGraphSchema, type ExtractedGraph } from "./schema.js";
import type { EpisodeContext, IEntityExtractor, LlmClient } from "./types.js";

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/;

/** Parse a model answer into an extraction, tolerating a Markdown code fence around the JSON. */
export function parseExtraction(text: string): ExtractedGraph {
  const fenced = FENCED_BLOCK.exec(text);
  const payload = (fenced ? fenced[1] : text).trim();

  let decoded: unknown;
  try {
    decoded = JSON.parse(payload);
  } catch (err) {
    throw new ExtractionError("Model response is not valid JSON", { cause: err });
  }

  const parsed = extractedGraphSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new ExtractionError(`Model response does not match the extraction schema: ${parsed.error.message}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export class LlmEntityExtractor implements IEntityExtractor {
  constructor(private readonly llm: LlmClient) {}

  async extract(context: EpisodeContext): Promise<ExtractedGraph> {
    const answer = await this.llm.generate(buildExtractionPrompt(context), { system: EXTRACTION_SYSTEM_PROMPT });
    return parseExtraction(answer);
  }
}
