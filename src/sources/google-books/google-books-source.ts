// ---------------------------------------------------------------------------
// Google Books source: the primary book-data source.
// ---------------------------------------------------------------------------

import { z } from "zod";

import type { BookCandidate, ISBN13 } from "../../core/types.js";
import { createCandidate, stripMarkup } from "../../domain/book/candidate.js";
import { validateISBN10, validateISBN13 } from "../../domain/isbn/isbn.js";
import { parseResponse } from "../../utils/http.js";
import { BaseBookSource, type SourceOptions } from "../base/base-source.js";

const ImageLinksSchema = z.object({
  smallThumbnail: z.string().optional(),
  thumbnail: z.string().optional(),
  small: z.string().optional(),
  medium: z.string().optional(),
  large: z.string().optional(),
  extraLarge: z.string().optional(),
});

const VolumeSchema = z.object({
  id: z.string(),
  volumeInfo: z.object({
    title: z.string().default(""),
    subtitle: z.string().optional(),
    authors: z.array(z.string()).optional(),
    publisher: z.string().optional(),
    publishedDate: z.string().optional(),
    description: z.string().optional(),
    industryIdentifiers: z
      .array(z.object({ type: z.string(), identifier: z.string() }))
      .optional(),
    pageCount: z.number().optional(),
    categories: z.array(z.string()).optional(),
    imageLinks: ImageLinksSchema.optional(),
  }),
});

const VolumesResponseSchema = z.object({
  totalItems: z.number().optional(),
  items: z.array(VolumeSchema).optional(),
});

type Volume = z.infer<typeof VolumeSchema>;

export interface GoogleBooksSourceOptions extends SourceOptions {
  baseUrl: string;
  /** Optional; empty or a `your_...` placeholder means "call anonymously". */
  apiKey: string;
  maxResults: number;
}

/** Largest available cover, upgraded to https. */
export function bestCoverUrl(links: z.infer<typeof ImageLinksSchema> | undefined): string | null {
  if (!links) return null;
  const url =
    links.extraLarge ??
    links.large ??
    links.medium ??
    links.small ??
    links.thumbnail ??
    links.smallThumbnail;
  return url ? url.replace(/^http:\/\//, "https://") : null;
}

export class GoogleBooksSource extends BaseBookSource {
  private readonly baseUrl: string;
  private readonly apiKey: string | null;
  private readonly maxResults: number;

  constructor(options: GoogleBooksSourceOptions) {
    super("Google Books", options);
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    const key = options.apiKey.trim();
    this.apiKey = key && !key.startsWith("your_") ? key : null;
    this.maxResults = Math.max(1, Math.min(40, options.maxResults));
  }

  protected executeIsbnSearch(isbn: ISBN13, signal?: AbortSignal): Promise<BookCandidate[]> {
    return this.searchVolumes(`isbn:${isbn}`, signal);
  }

  protected executeTitleAuthorSearch(
    title: string,
    author: string,
    signal?: AbortSignal,
  ): Promise<BookCandidate[]> {
    return this.searchVolumes(`intitle:"${title}" inauthor:"${author}"`, signal);
  }

  protected override redactUrl(url: URL): string {
    if (!url.searchParams.has("key")) return url.toString();
    const copy = new URL(url);
    copy.searchParams.set("key", "***");
    return copy.toString();
  }

  private async searchVolumes(q: string, signal?: AbortSignal): Promise<BookCandidate[]> {
    const url = new URL(`${this.baseUrl}/volumes`);
    url.searchParams.set("q", q);
    url.searchParams.set("printType", "books");
    url.searchParams.set("maxResults", String(this.maxResults));
    if (this.apiKey) url.searchParams.set("key", this.apiKey);

    const data = parseResponse(VolumesResponseSchema, await this.getJson(url, signal), this.name);
    return (data.items ?? [])
      .filter((item) => item.volumeInfo.title.trim().length > 0)
      .map((item) => this.toCandidate(item));
  }

  private toCandidate(item: Volume): BookCandidate {
    const info = item.volumeInfo;
    const ids = info.industryIdentifiers ?? [];
    const isbn13 = ids
      .filter((id) => id.type === "ISBN_13")
      .map((id) => validateISBN13(id.identifier))
      .find((v): v is ISBN13 => v !== null);
    const isbn10 = ids
      .filter((id) => id.type === "ISBN_10")
      .map((id) => validateISBN10(id.identifier))
      .find((v) => v !== null);

    return createCandidate({
      title: info.title,
      subtitle: info.subtitle ?? null,
      authors: info.authors ?? [],
      description: info.description ? stripMarkup(info.description) : null,
      identifiers: {
        isbn13,
        isbn10: isbn10 ?? undefined,
        sourceId: item.id,
      },
      coverUrl: bestCoverUrl(info.imageLinks),
      publishedDate: info.publishedDate ?? null,
      publisher: info.publisher ?? null,
      pageCount: info.pageCount ?? null,
      subjects: info.categories ?? [],
      source: this.role,
      sourceName: this.name,
    });
  }
}
