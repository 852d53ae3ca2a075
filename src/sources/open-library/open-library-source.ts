// ---------------------------------------------------------------------------
// Open Library source: fallback book-data source and description lookup.
// ---------------------------------------------------------------------------

import { z } from "zod";

import type { BookCandidate, ISBN13 } from "../../core/types.js";
import { createCandidate } from "../../domain/book/candidate.js";
import { toISBN13, validateISBN10 } from "../../domain/isbn/isbn.js";
import { parseResponse } from "../../utils/http.js";
import { BaseBookSource, type SourceOptions } from "../base/base-source.js";

/** Search docs omit heavy fields unless asked for. */
const SEARCH_FIELDS = [
  "key",
  "title",
  "subtitle",
  "author_name",
  "first_publish_year",
  "publish_year",
  "publisher",
  "number_of_pages_median",
  "isbn",
  "cover_i",
  "subject",
].join(",");

const SearchDocSchema = z.object({
  key: z.string(), // e.g. "/works/OL27448W"
  title: z.string().default(""),
  subtitle: z.string().optional(),
  author_name: z.array(z.string()).optional(),
  first_publish_year: z.number().optional(),
  publish_year: z.array(z.number()).optional(),
  publisher: z.array(z.string()).optional(),
  number_of_pages_median: z.number().optional(),
  isbn: z.array(z.string()).optional(),
  cover_i: z.number().optional(),
  subject: z.array(z.string()).optional(),
});

const SearchResponseSchema = z.object({
  numFound: z.number().optional(),
  docs: z.array(SearchDocSchema).default([]),
});

const DescriptionSchema = z.union([z.string(), z.object({ value: z.string() })]);

const WorkSchema = z.object({
  description: DescriptionSchema.optional(),
});

type SearchDoc = z.infer<typeof SearchDocSchema>;

export interface OpenLibrarySourceOptions extends SourceOptions {
  baseUrl: string;
  limit: number;
  coversBaseUrl?: string;
}

export class OpenLibrarySource extends BaseBookSource {
  private readonly baseUrl: string;
  private readonly coversBaseUrl: string;
  private readonly limit: number;

  constructor(options: OpenLibrarySourceOptions) {
    super("Open Library", options);
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.coversBaseUrl = (options.coversBaseUrl ?? "https://covers.openlibrary.org").replace(/\/+$/, "");
    this.limit = Math.max(1, Math.min(50, options.limit));
  }

  protected executeIsbnSearch(isbn: ISBN13, signal?: AbortSignal): Promise<BookCandidate[]> {
    return this.search({ isbn }, isbn, signal);
  }

  protected executeTitleAuthorSearch(
    title: string,
    author: string,
    signal?: AbortSignal,
  ): Promise<BookCandidate[]> {
    return this.search({ title, author }, undefined, signal);
  }

  /**
   * Read a work's description. Search docs never carry one, so this is the
   * only way to get prose out of Open Library.
   */
  fetchWorkDescription(workKey: string, signal?: AbortSignal): Promise<string | null> {
    return this.guard({ workKey }, async () => {
      if (!workKey.startsWith("/works/")) return null;
      const url = new URL(`${this.baseUrl}${workKey}.json`);
      const work = parseResponse(WorkSchema, await this.getJson(url, signal), this.name);
      const desc = work.description;
      if (desc === undefined) return null;
      const text = (typeof desc === "string" ? desc : desc.value).trim();
      return text.length > 0 ? text : null;
    });
  }

  private async search(
    params: Record<string, string>,
    queriedIsbn: ISBN13 | undefined,
    signal?: AbortSignal,
  ): Promise<BookCandidate[]> {
    const url = new URL(`${this.baseUrl}/search.json`);
    for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);
    url.searchParams.set("fields", SEARCH_FIELDS);
    url.searchParams.set("limit", String(this.limit));

    const data = parseResponse(SearchResponseSchema, await this.getJson(url, signal), this.name);
    return data.docs
      .filter((doc) => doc.title.trim().length > 0)
      .map((doc) => this.toCandidate(doc, queriedIsbn));
  }

  private toCandidate(doc: SearchDoc, queriedIsbn: ISBN13 | undefined): BookCandidate {
    const rawIsbns = doc.isbn ?? [];
    const isbn13 =
      queriedIsbn ??
      rawIsbns
        .filter((raw) => raw.replace(/[\s-]/g, "").length === 13)
        .map((raw) => toISBN13(raw))
        .find((v): v is ISBN13 => v !== null);
    const isbn10 = rawIsbns
      .map((raw) => validateISBN10(raw))
      .find((v) => v !== null);

    return createCandidate({
      title: doc.title,
      subtitle: doc.subtitle ?? null,
      authors: doc.author_name ?? [],
      description: null,
      identifiers: { isbn13, isbn10: isbn10 ?? undefined, sourceId: doc.key },
      coverUrl:
        doc.cover_i !== undefined ? `${this.coversBaseUrl}/b/id/${doc.cover_i}-L.jpg` : null,
      publishedDate: latestYear(doc),
      publisher: doc.publisher?.[0] ?? null,
      pageCount: doc.number_of_pages_median ?? null,
      subjects: (doc.subject ?? []).slice(0, 10),
      source: this.role,
      sourceName: this.name,
    });
  }
}

function latestYear(doc: SearchDoc): string | null {
  const years = doc.publish_year ?? [];
  if (years.length > 0) return String(Math.max(...years));
  return doc.first_publish_year !== undefined ? String(doc.first_publish_year) : null;
}
