import { describe, it, expect } from "vitest";

import { createTextBackend, isPlaceholderSecret } from "../../../src/llm/create-backend.js";
import { DEFAULT_CONFIG } from "../../../src/config/config.js";
import type { AppConfig, LlmConfig } from "../../../src/core/types.js";
import { ConfigurationError } from "../../../src/core/errors.js";
import { OllamaBackend } from "../../../src/llm/ollama-backend.js";
import { createSilentLogger } from "../../helpers/fakes.js";

function withLlm(llm: Partial<LlmConfig>): AppConfig {
  return { ...DEFAULT_CONFIG, llm: { ...DEFAULT_CONFIG.llm, ...llm } };
}

const logger = createSilentLogger();

describe("isPlaceholderSecret", () => {
  it("treats blank and template values as missing", () => {
    expect(isPlaceholderSecret("")).toBe(true);
    expect(isPlaceholderSecret("  ")).toBe(true);
    expect(isPlaceholderSecret("your_openai_api_key")).toBe(true);
    expect(isPlaceholderSecret("test-secret")).toBe(false);
  });
});

describe("createTextBackend", () => {
  it("builds the OpenAI backend with its configured model", () => {
    const backend = createTextBackend(
      withLlm({
        provider: "openai",
        openai: { ...DEFAULT_CONFIG.llm.openai, apiKey: "test-secret", model: "gpt-test" },
      }),
      logger,
    );
    expect(backend.provider).toBe("openai");
    expect(backend.model).toBe("gpt-test");
  });

  it("builds the Anthropic backend", () => {
    const backend = createTextBackend(
      withLlm({
        provider: "anthropic",
        anthropic: { ...DEFAULT_CONFIG.llm.anthropic, apiKey: "test-secret" },
      }),
      logger,
    );
    expect(backend.provider).toBe("anthropic");
  });

  it("builds the Ollama backend without a key", () => {
    const backend = createTextBackend(withLlm({ provider: "ollama" }), logger);
    expect(backend.provider).toBe("ollama");
    expect(backend.model).toBe("llama3.1");
  });

  it("uses the text backend timeout rather than the lookup timeout", () => {
    const backend = createTextBackend(
      withLlm({ provider: "ollama", timeoutMs: 90_000 }),
      logger,
    );
    expect(backend).toBeInstanceOf(OllamaBackend);
    if (backend instanceof OllamaBackend) expect(backend.timeoutMs).toBe(90_000);
  });

  it("refuses a placeholder key", () => {
    expect(() =>
      createTextBackend(
        withLlm({
          provider: "anthropic",
          anthropic: { ...DEFAULT_CONFIG.llm.anthropic, apiKey: "your_anthropic_api_key" },
        }),
        logger,
      ),
    ).toThrow(new ConfigurationError("Anthropic API key not configured"));
  });
});
