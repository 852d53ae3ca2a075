// ---------------------------------------------------------------------------
// Pluggable text-generation backend contract.
// ---------------------------------------------------------------------------

import type { LlmProvider } from "../core/types.js";

export interface GenerateOptions {
  maxTokens?: number;
  temperature?: number;
}

/**
 * Every provider implements this interface. One instance is chosen from
 * configuration at startup; the rest of the pipeline only ever sees
 * `generate`.
 */
export interface TextBackend {
  readonly provider: LlmProvider;
  readonly model: string;

  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export const DEFAULT_MAX_TOKENS = 1000;
export const DEFAULT_TEMPERATURE = 0.7;
