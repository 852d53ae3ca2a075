// ---------------------------------------------------------------------------
// Tests for the retry / exponential-backoff logic.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { withRetry } from "../../../src/orchestrator/retry.js";
import {
  BackendContractError,
  BaserowRequestError,
  TextBackendError,
} from "../../../src/core/errors.js";

/**
 * Create a function that throws on the first N calls and then resolves.
 * Using async functions with `throw` (not `Promise.reject`) avoids
 * unhandled-rejection warnings in vitest.
 */
function failThenSucceed(
  error: Error,
  failCount: number,
  successValue: string = "ok",
): () => Promise<string> {
  let calls = 0;
  return async () => {
    calls++;
    if (calls <= failCount) throw error;
    return successValue;
  };
}

function alwaysFail(error: Error): () => Promise<string> {
  return async () => {
    throw error;
  };
}

/**
 * Calls withRetry expecting failure, advances all fake timers and returns
 * the caught error.
 */
async function expectRetryFailure(
  fn: () => Promise<string>,
  options: Parameters<typeof withRetry>[1],
): Promise<unknown> {
  let caughtError: unknown;
  const promise = withRetry(fn, options).catch((e: unknown) => {
    caughtError = e;
  });
  await vi.runAllTimersAsync();
  await promise;
  return caughtError;
}

const contract = (msg: string) => new BackendContractError(msg, "reply");

describe("withRetry", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the result when the function succeeds on the first call", async () => {
    const fn = vi.fn(async () => "ok");
    const result = await withRetry(fn, { maxRetries: 3, baseDelayMs: 100 });
    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries a broken backend contract and succeeds", async () => {
    const fn = vi.fn(failThenSucceed(contract("wrong labels"), 2, "recovered"));

    const promise = withRetry(fn, { maxRetries: 3, baseDelayMs: 10 });
    await vi.runAllTimersAsync();

    expect(await promise).toBe("recovered");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("passes the zero-based attempt number to the function", async () => {
    const seen: number[] = [];
    const promise = withRetry(
      async (attempt) => {
        seen.push(attempt);
        if (attempt < 2) throw contract("again");
        return "done";
      },
      { maxRetries: 5, baseDelayMs: 10 },
    );
    await vi.runAllTimersAsync();

    expect(await promise).toBe("done");
    expect(seen).toEqual([0, 1, 2]);
  });

  it("throws the last error after exhausting all retries", async () => {
    const fn = vi.fn(alwaysFail(contract("still wrong")));

    const err = await expectRetryFailure(fn, { maxRetries: 2, baseDelayMs: 10 });

    expect(err).toBeInstanceOf(BackendContractError);
    expect(err).toHaveProperty("message", "still wrong");
    // initial call + 2 retries = 3
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry when maxRetries is 0", async () => {
    const fn = vi.fn(alwaysFail(contract("fail")));

    const err = await expectRetryFailure(fn, { maxRetries: 0, baseDelayMs: 10 });

    expect(err).toBeInstanceOf(BackendContractError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("does not retry TextBackendError (transport failure)", async () => {
    const fn = vi.fn(alwaysFail(new TextBackendError("HTTP 500", "openai")));

    const err = await expectRetryFailure(fn, { maxRetries: 5, baseDelayMs: 10 });

    expect(err).toBeInstanceOf(TextBackendError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("does not retry Baserow failures", async () => {
    const fn = vi.fn(alwaysFail(new BaserowRequestError("create entry", 500, "boom")));

    const err = await expectRetryFailure(fn, { maxRetries: 5, baseDelayMs: 10 });

    expect(err).toBeInstanceOf(BaserowRequestError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("does not retry plain errors by default", async () => {
    const fn = vi.fn(alwaysFail(new Error("mysterious error")));

    const err = await expectRetryFailure(fn, { maxRetries: 3, baseDelayMs: 10 });

    expect(err).toHaveProperty("message", "mysterious error");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("uses a custom shouldRetry predicate when provided", async () => {
    const fn = vi.fn(failThenSucceed(new Error("custom transient"), 1));

    const promise = withRetry(fn, {
      maxRetries: 3,
      baseDelayMs: 10,
      shouldRetry: (error) => error instanceof Error && error.message === "custom transient",
    });
    await vi.runAllTimersAsync();

    expect(await promise).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("reports each retry with its 1-based number", async () => {
    const onRetry = vi.fn();
    const fn = failThenSucceed(contract("nope"), 2);

    const promise = withRetry(fn, { maxRetries: 3, baseDelayMs: 10, onRetry });
    await vi.runAllTimersAsync();
    await promise;

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls.map((call) => call[1])).toEqual([1, 2]);
  });

  it("does not wait when the base delay is zero", async () => {
    vi.useRealTimers();
    const fn = vi.fn(failThenSucceed(contract("nope"), 2));

    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 0 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
  });
});
