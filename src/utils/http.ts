// ---------------------------------------------------------------------------
// JSON-over-HTTP helper shared by the book-data sources.
// ---------------------------------------------------------------------------

import type { z } from "zod";

import {
  SourceConnectionError,
  SourceHttpError,
  SourceParseError,
  SourceTimeoutError,
  SourceUnavailableError,
} from "../core/errors.js";

export const USER_AGENT = "Shelfwright/0.1 (personal catalog tool)";

export interface FetchJsonOptions {
  /** Source name used in error messages, e.g. "Google Books". */
  source: string;
  timeoutMs: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

/**
 * Combine the caller's signal (if any) with a per-call deadline.
 */
export function deadline(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

function isAbort(error: unknown): error is Error {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

/**
 * Map anything thrown while talking to a source onto the
 * {@link SourceUnavailableError} family.
 */
export function toSourceError(
  error: unknown,
  source: string,
): SourceUnavailableError {
  if (error instanceof SourceUnavailableError) return error;

  if (isAbort(error)) {
    return new SourceTimeoutError(`${source} request was aborted: ${error.message}`, source, {
      cause: error,
    });
  }

  // fetch() rejects with TypeError on DNS / connection failures.
  if (error instanceof TypeError) {
    return new SourceConnectionError(
      `Network error calling ${source}: ${error.message}`,
      source,
      { cause: error },
    );
  }

  const msg = error instanceof Error ? error.message : String(error);
  return new SourceUnavailableError(`${source} request failed: ${msg}`, source, {
    cause: error instanceof Error ? error : undefined,
  });
}

/**
 * GET a URL and return its decoded JSON body.
 *
 * Non-2xx answers become {@link SourceHttpError}; an undecodable body becomes
 * {@link SourceParseError}.
 */
export async function fetchJson(
  url: string | URL,
  options: FetchJsonOptions,
): Promise<unknown> {
  const { source } = options;

  let resp: Response;
  try {
    resp = await fetch(url, {
      headers: {
        "user-agent": USER_AGENT,
        accept: "application/json",
        ...options.headers,
      },
      signal: deadline(options.timeoutMs, options.signal),
    });
  } catch (error: unknown) {
    throw toSourceError(error, source);
  }

  if (!resp.ok) {
    throw new SourceHttpError(source, resp.status);
  }

  try {
    return await resp.json();
  } catch (error: unknown) {
    if (isAbort(error)) throw toSourceError(error, source);
    throw new SourceParseError(`${source} returned a body that is not JSON`, source, {
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Validate a decoded body against a zod schema, reporting the first issues as
 * a {@link SourceParseError}.
 */
export function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  source: string,
): z.output<T> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 3)
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new SourceParseError(`Unexpected ${source} response: ${issues}`, source, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
