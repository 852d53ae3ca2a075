// ---------------------------------------------------------------------------
// Anthropic Messages API backend.
// ---------------------------------------------------------------------------

import Anthropic from "@anthropic-ai/sdk";
import type { Logger } from "pino";

import { LlmProvider } from "../core/types.js";
import { TextBackendError } from "../core/errors.js";
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type GenerateOptions,
  type TextBackend,
} from "./text-backend.js";

/** The slice of the SDK client this backend calls. */
export interface MessagesClient {
  messages: {
    create(params: {
      model: string;
      max_tokens: number;
      temperature?: number;
      messages: Array<{ role: "user"; content: string }>;
    }): Promise<{ content: Array<{ type: string; text?: string }> }>;
  };
}

export interface AnthropicBackendOptions {
  apiKey: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
  /** Injected for tests; built from `apiKey`/`baseUrl` otherwise. */
  client?: MessagesClient;
}

export class AnthropicBackend implements TextBackend {
  public readonly provider = LlmProvider.ANTHROPIC;
  public readonly model: string;

  private readonly client: MessagesClient;
  private readonly logger: Logger;

  constructor(options: AnthropicBackendOptions) {
    this.model = options.model;
    this.logger = options.logger;
    this.client =
      options.client ??
      new Anthropic({
        apiKey: options.apiKey,
        // The SDK appends /v1 itself.
        baseURL: options.baseUrl.replace(/\/+$/, "").replace(/\/v1$/, ""),
        timeout: options.timeoutMs,
        maxRetries: 0,
      });
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const start = performance.now();

    let response: { content: Array<{ type: string; text?: string }> };
    try {
      response = await this.client.messages.create({
        model: this.model,
        max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: options.temperature ?? DEFAULT_TEMPERATURE,
        messages: [{ role: "user", content: prompt }],
      });
    } catch (error: unknown) {
      const msg = error instanceof Error ? error.message : String(error);
      throw new TextBackendError(`anthropic request failed: ${msg}`, this.provider, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    const text = response.content
      .filter((block) => block.type === "text" && typeof block.text === "string")
      .map((block) => block.text ?? "")
      .join("");

    if (!text) {
      throw new TextBackendError("No text in Anthropic response", this.provider);
    }

    this.logger.debug(
      { provider: this.provider, model: this.model, durationMs: Math.round(performance.now() - start) },
      "text backend answered",
    );
    return text;
  }
}
