import { describeEpisodeType } from "../episode.js";
import type { EpisodeContext } from "./types.js";

export const EXTRACTION_SYSTEM_PROMPT =
  "You extract entities and the facts that connect them from short documents. " +
  "Answer with a single JSON object and nothing else.";

const OUTPUT_FORMAT = `{
  "entities": [
    { "name": string, "labels": string[], "summary": string, "attributes": { [key: string]: string | number | boolean } }
  ],
  "facts": [
    { "source": string, "target": string, "relation": string, "fact": string, "validAt": string | null, "invalidAt": string | null }
  ]
}`;

export function buildExtractionPrompt(context: EpisodeContext): string {
  const content =
    typeof context.content === "string" ? context.content : JSON.stringify(context.content, null, 2);

  return [
    `Episode: ${context.name}`,
    `Source: ${describeEpisodeType(context.source)} (${context.sourceDescription})`,
    `Reference time: ${context.referenceTime.toISOString()}`,
    "",
    "Content:",
    content,
    "",
    "Rules:",
    "- Every fact's source and target must be the exact name of an entity in the entities list.",
    "- relation is a short verb phrase such as \"holds office\" or \"previously worked in\".",
    "- validAt and invalidAt are ISO 8601 timestamps when the content states when the fact started or stopped being true; resolve relative dates against the reference time; otherwise null.",
    "- For JSON content, keep scalar fields that describe an entity as its attributes.",
    "",
    "Respond with JSON in this format:",
    OUTPUT_FORMAT,
  ].join("\n");
}
