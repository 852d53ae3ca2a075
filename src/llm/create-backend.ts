// ---------------------------------------------------------------------------
// Backend factory: one TextBackend per invocation, chosen by configuration.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { AppConfig } from "../core/types.js";
import { LlmProvider } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";
import { AnthropicBackend } from "./anthropic-backend.js";
import { OllamaBackend } from "./ollama-backend.js";
import { OpenAiBackend } from "./openai-backend.js";
import type { TextBackend } from "./text-backend.js";

/** Empty keys and `your_...` template values both count as missing. */
export function isPlaceholderSecret(value: string): boolean {
  const v = value.trim();
  return v.length === 0 || v.startsWith("your_");
}

function requireKey(value: string, provider: string): string {
  if (isPlaceholderSecret(value)) {
    throw new ConfigurationError(`${provider} API key not configured`);
  }
  return value.trim();
}

export function createTextBackend(config: AppConfig, logger: Logger): TextBackend {
  const { llm } = config;
  const child = logger.child({ module: "llm", provider: llm.provider });

  switch (llm.provider) {
    case LlmProvider.OPENAI:
      return new OpenAiBackend({
        apiKey: requireKey(llm.openai.apiKey, "OpenAI"),
        baseUrl: llm.openai.baseUrl,
        model: llm.openai.model,
        timeoutMs: llm.timeoutMs,
        logger: child,
      });

    case LlmProvider.ANTHROPIC:
      return new AnthropicBackend({
        apiKey: requireKey(llm.anthropic.apiKey, "Anthropic"),
        baseUrl: llm.anthropic.baseUrl,
        model: llm.anthropic.model,
        timeoutMs: llm.timeoutMs,
        logger: child,
      });

    case LlmProvider.OLLAMA:
      return new OllamaBackend({
        baseUrl: llm.ollama.baseUrl,
        model: llm.ollama.model,
        timeoutMs: llm.timeoutMs,
        logger: child,
      });
  }
}
