// ---------------------------------------------------------------------------
// Local Ollama backend (/api/generate, non-streaming).
// ---------------------------------------------------------------------------

import { z } from "zod";

import { LlmProvider } from "../core/types.js";
import { HttpTextBackend } from "./http-backend.js";
import type { GenerateOptions } from "./text-backend.js";

const GenerateResponseSchema = z.object({
  response: z.string(),
  done: z.boolean().optional(),
});

export class OllamaBackend extends HttpTextBackend {
  public readonly provider = LlmProvider.OLLAMA;

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const body: Record<string, unknown> = { model: this.model, prompt, stream: false };
    if (options.temperature !== undefined || options.maxTokens !== undefined) {
      body.options = {
        ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
        ...(options.maxTokens !== undefined ? { num_predict: options.maxTokens } : {}),
      };
    }

    const data = await this.postJson("/api/generate", body, GenerateResponseSchema);
    return data.response;
  }
}
