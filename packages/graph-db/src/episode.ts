import { z } from "zod";
import { EpisodeParseError } from "./errors.js";
import type { EpisodeContent, EpisodeInput, EpisodeType, JsonObject, JsonValue } from "./types/graph.js";

// Only values that JSON.stringify writes and JSON.parse reads back unchanged.
const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

/**
 * Encode episode content as an episode body. Structured content is checked
 * first, so a value that would be dropped or altered by JSON (undefined,
 * dates, bigints, non-finite numbers) is rejected instead of stored.
 */
export function serializeEpisodeBody(content: EpisodeContent, episodeName: string): string {
  if (typeof content === "string") return content;

  const checked = jsonObjectSchema.safeParse(content);
  if (!checked.success) {
    throw new EpisodeParseError(
      `Episode ${episodeName} has content that is not plain JSON: ${checked.error.message}`,
      episodeName,
      { cause: checked.error },
    );
  }
  return JSON.stringify(checked.data);
}

/**
 * Recover the content an episode was submitted with. Text bodies pass through;
 * json bodies must decode to an object.
 */
export function parseEpisodeContent(input: Pick<EpisodeInput, "name" | "episodeBody" | "source">): EpisodeContent {
  if (input.source === "text") return input.episodeBody;

  let decoded: unknown;
  try {
    decoded = JSON.parse(input.episodeBody);
  } catch (err) {
    throw new EpisodeParseError(`Episode ${input.name} is not valid JSON`, input.name, { cause: err });
  }

  const parsed = jsonObjectSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new EpisodeParseError(`Episode ${input.name} must be a JSON object`, input.name);
  }
  return parsed.data;
}

export function describeEpisodeType(type: EpisodeType): string {
  return type === "json" ? "structured JSON record" : "free text";
}
