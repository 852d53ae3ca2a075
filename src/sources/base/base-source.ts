// ---------------------------------------------------------------------------
// BaseBookSource – abstract base class shared by every book-data source.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { BookCandidate, BookSource, ISBN13, SourceRole } from "../../core/types.js";
import { fetchJson, toSourceError } from "../../utils/http.js";

export interface SourceOptions {
  /** Provenance tag stamped on every candidate this source produces. */
  role: SourceRole;
  timeoutMs: number;
  logger: Logger;
}

/**
 * Abstract base that implements the {@link BookSource} contract. Concrete
 * sources provide {@link executeIsbnSearch} and
 * {@link executeTitleAuthorSearch}.
 *
 * The base class provides:
 *   - Response-time measurement and logging around every search.
 *   - Consistent error wrapping: whatever a source throws leaves this class
 *     as a `SourceUnavailableError`.
 */
export abstract class BaseBookSource implements BookSource {
  public readonly name: string;

  protected readonly role: SourceRole;
  protected readonly timeoutMs: number;
  protected readonly logger: Logger;

  constructor(name: string, options: SourceOptions) {
    this.name = name;
    this.role = options.role;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger.child({ source: name, role: options.role });
  }

  // ── Public interface ────────────────────────────────────────────────────

  searchByIsbn(isbn: ISBN13, signal?: AbortSignal): Promise<BookCandidate[]> {
    return this.guard({ isbn }, () => this.executeIsbnSearch(isbn, signal));
  }

  searchByTitleAuthor(
    title: string,
    author: string,
    signal?: AbortSignal,
  ): Promise<BookCandidate[]> {
    return this.guard({ title, author }, () =>
      this.executeTitleAuthorSearch(title, author, signal),
    );
  }

  // ── Abstract methods for subclasses ─────────────────────────────────────

  protected abstract executeIsbnSearch(
    isbn: ISBN13,
    signal?: AbortSignal,
  ): Promise<BookCandidate[]>;

  protected abstract executeTitleAuthorSearch(
    title: string,
    author: string,
    signal?: AbortSignal,
  ): Promise<BookCandidate[]>;

  // ── Protected helpers ───────────────────────────────────────────────────

  protected getJson(url: URL, signal?: AbortSignal): Promise<unknown> {
    this.logger.debug({ url: this.redactUrl(url) }, "GET");
    return fetchJson(url, { source: this.name, timeoutMs: this.timeoutMs, signal });
  }

  /** Hook for sources that put credentials in the query string. */
  protected redactUrl(url: URL): string {
    return url.toString();
  }

  protected async guard<T>(
    context: Record<string, string>,
    fn: () => Promise<T>,
  ): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      this.logger.debug(
        {
          ...context,
          results: Array.isArray(result) ? result.length : undefined,
          responseTimeMs: Math.round(performance.now() - start),
        },
        "Request completed",
      );
      return result;
    } catch (error: unknown) {
      const wrapped = toSourceError(error, this.name);
      this.logger.warn(
        { ...context, responseTimeMs: Math.round(performance.now() - start), err: wrapped },
        "Request failed",
      );
      throw wrapped;
    }
  }
}
