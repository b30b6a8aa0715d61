import Anthropic from "@anthropic-ai/sdk";
import { RateLimitError } from "../errors.js";
import type { GenerateOptions, LlmClient } from "./types.js";

export const DEFAULT_ANTHROPIC_MODEL = "claude-haiku-4-5-20251001";
const DEFAULT_MAX_TOKENS = 2048;

export interface AnthropicLlmConfig {
  apiKey: string;
  model?: string;
  maxTokens?: number;
}

/**
 * Translate provider errors into the graph package's error types. Throttling
 * becomes RateLimitError; everything else is returned unchanged.
 */
export function toGraphError(error: unknown): unknown {
  if (error instanceof Anthropic.RateLimitError) {
    return new RateLimitError(`Anthropic rate limit: ${error.message}`, { cause: error });
  }
  return error;
}

export class AnthropicLlmClient implements LlmClient {
  private client: Anthropic;
  private model: string;
  private maxTokens: number;

  constructor(config: AnthropicLlmConfig) {
    // Retries belong to the caller's retry policy, not the SDK.
    this.client = new Anthropic({ apiKey: config.apiKey, maxRetries: 0 });
    this.model = config.model ?? DEFAULT_ANTHROPIC_MODEL;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: options.maxTokens ?? this.maxTokens,
        ...(options.system ? { system: options.system } : {}),
        messages: [{ role: "user", content: prompt }],
      });

      let text = "";
      for (const block of response.content) {
        if (block.type === "text") text += block.text;
      }
      return text;
    } catch (err) {
      throw toGraphError(err);
    }
  }
}
