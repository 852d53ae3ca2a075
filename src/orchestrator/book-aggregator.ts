// ---------------------------------------------------------------------------
// Book source aggregator: primary source, single fallback, optional
// description enrichment.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { BookCandidate, BookSource, SearchQuery } from "../core/types.js";
import { SourceRole } from "../core/types.js";
import {
  AllSourcesFailedError,
  BookNotFoundError,
  SourceUnavailableError,
  describeQuery,
} from "../core/errors.js";
import { countWords, withDescription, withWebNotes } from "../domain/book/candidate.js";
import {
  abstractText,
  relatedTexts,
  type WebSnippet,
} from "../sources/web-search/web-search-client.js";

/** Anything that can turn an Open Library work key into prose. */
export interface WorkDescriptionLookup {
  fetchWorkDescription(workKey: string, signal?: AbortSignal): Promise<string | null>;
}

export interface WebEnricher {
  searchBookInfo(title: string, author: string, signal?: AbortSignal): Promise<WebSnippet[]>;
}

export interface BookSourceAggregatorDeps {
  primary: BookSource;
  fallback: BookSource;
  workDescriptions?: WorkDescriptionLookup | null;
  web?: WebEnricher | null;
  /** Descriptions at or above this many words are left alone by enrichment. */
  minDescriptionWords: number;
  logger: Logger;
}

/**
 * Resolves a {@link SearchQuery} to candidates.
 *
 * The primary source is always asked first. The fallback is asked exactly
 * once, and only when the primary returned nothing or failed. Neither call
 * is retried.
 */
export class BookSourceAggregator {
  private readonly deps: BookSourceAggregatorDeps;
  private readonly logger: Logger;

  constructor(deps: BookSourceAggregatorDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ module: "aggregator" });
  }

  async findCandidates(query: SearchQuery, signal?: AbortSignal): Promise<BookCandidate[]> {
    const { primary, fallback } = this.deps;
    const failures: SourceUnavailableError[] = [];

    try {
      const results = await this.ask(primary, query, signal);
      if (results.length > 0) {
        this.logger.info({ source: primary.name, count: results.length }, "primary source answered");
        return results;
      }
      this.logger.info({ source: primary.name }, "primary source returned no results; trying fallback");
    } catch (error: unknown) {
      if (!(error instanceof SourceUnavailableError)) throw error;
      failures.push(error);
      this.logger.warn({ source: primary.name, err: error }, "primary source failed; trying fallback");
    }

    let results: BookCandidate[];
    try {
      results = await this.ask(fallback, query, signal);
    } catch (error: unknown) {
      if (!(error instanceof SourceUnavailableError)) throw error;
      failures.push(error);
      throw new AllSourcesFailedError(query, failures);
    }

    if (results.length === 0) {
      this.logger.info({ query: describeQuery(query) }, "no source returned results");
      throw new BookNotFoundError(query, { cause: failures[0] });
    }
    return results;
  }

  /**
   * Fill in missing description text on an already-chosen candidate.
   * Failures are logged and the candidate is returned unchanged.
   */
  async enrich(candidate: BookCandidate, signal?: AbortSignal): Promise<BookCandidate> {
    let current = candidate;
    const { workDescriptions, web, minDescriptionWords } = this.deps;
    const workKey = current.identifiers.sourceId;

    if (!current.description && workDescriptions && workKey?.startsWith("/works/")) {
      try {
        const description = await workDescriptions.fetchWorkDescription(workKey, signal);
        if (description) current = withDescription(current, description);
      } catch (error: unknown) {
        this.logger.warn({ workKey, err: error }, "work description lookup failed");
      }
    }

    const words = countWords(current.description);
    if (!web || words >= minDescriptionWords) return current;

    try {
      const snippets = await web.searchBookInfo(
        current.title,
        current.authors[0] ?? "",
        signal,
      );
      const text = abstractText(snippets);
      if (countWords(text) > words) {
        this.logger.info({ snippets: snippets.length }, "description filled from web abstract");
        current = withDescription(current, text, SourceRole.WEB_ENRICHMENT);
      }
      const notes = relatedTexts(snippets);
      if (notes.length > 0) current = withWebNotes(current, notes);
    } catch (error: unknown) {
      this.logger.warn({ err: error }, "web search enrichment failed");
    }
    return current;
  }

  private ask(source: BookSource, query: SearchQuery, signal?: AbortSignal): Promise<BookCandidate[]> {
    return query.kind === "isbn"
      ? source.searchByIsbn(query.isbn13, signal)
      : source.searchByTitleAuthor(query.title, query.author, signal);
  }
}
