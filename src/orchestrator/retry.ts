// ---------------------------------------------------------------------------
// Retry logic with exponential backoff and jitter.
// ---------------------------------------------------------------------------

import { BackendContractError } from "../core/errors.js";

// ── Types ──────────────────────────────────────────────────────────────────

export interface RetryOptions {
  /** Maximum number of retries (0 means no retries, just the initial call). */
  maxRetries: number;
  /** Base delay in milliseconds before the first retry. */
  baseDelayMs: number;
  /**
   * Predicate that decides whether a given error is retryable.
   *
   * When omitted only {@link BackendContractError} is retried: a text
   * backend that broke a step's contract may answer correctly when asked
   * again. Transport and store failures are terminal.
   */
  shouldRetry?: (error: unknown) => boolean;
  /** Called before each retry with the 1-based retry number. */
  onRetry?: (error: unknown, retry: number) => void;
}

function defaultShouldRetry(error: unknown): boolean {
  return error instanceof BackendContractError;
}

// ── Delay helper ───────────────────────────────────────────────────────────

/**
 * Exponential backoff with full jitter (random value between 0 and the
 * exponential ceiling).
 */
function computeDelay(attempt: number, baseDelayMs: number): number {
  const exponential = baseDelayMs * 2 ** attempt;
  return Math.round(Math.random() * exponential);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ── Public API ─────────────────────────────────────────────────────────────

/**
 * Execute `fn`, retrying up to `maxRetries` times while `shouldRetry`
 * accepts the error. The last error is thrown once attempts run out.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { maxRetries, baseDelayMs, shouldRetry = defaultShouldRetry, onRetry } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      if (!shouldRetry(error) || attempt >= maxRetries) {
        throw error;
      }
      onRetry?.(error, attempt + 1);
      if (baseDelayMs > 0) await sleep(computeDelay(attempt, baseDelayMs));
    }
  }
}
