// ---------------------------------------------------------------------------
// OpenAI-compatible chat-completions backend.
// ---------------------------------------------------------------------------

import { z } from "zod";

import { LlmProvider } from "../core/types.js";
import { TextBackendError } from "../core/errors.js";
import { HttpTextBackend, type HttpBackendOptions } from "./http-backend.js";
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, type GenerateOptions } from "./text-backend.js";

const ChatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ role: z.string(), content: z.string().nullable() }),
    }),
  ),
});

export interface OpenAiBackendOptions extends HttpBackendOptions {
  apiKey: string;
}

export class OpenAiBackend extends HttpTextBackend {
  public readonly provider = LlmProvider.OPENAI;
  private readonly apiKey: string;

  constructor(options: OpenAiBackendOptions) {
    super(options);
    this.apiKey = options.apiKey;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const data = await this.postJson(
      "/chat/completions",
      {
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: options.temperature ?? DEFAULT_TEMPERATURE,
      },
      ChatCompletionSchema,
      { authorization: `Bearer ${this.apiKey}` },
    );

    const content = data.choices[0]?.message.content;
    if (content === undefined || content === null) {
      throw new TextBackendError("No response from OpenAI", this.provider);
    }
    return content;
  }
}
