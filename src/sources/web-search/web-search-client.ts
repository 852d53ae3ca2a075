// ---------------------------------------------------------------------------
// Web-search enrichment via the DuckDuckGo Instant Answer API.
//
// Only fills descriptive text for a book that is already identified; it never
// produces candidates of its own.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";
import { z } from "zod";

import { fetchJson, parseResponse, toSourceError } from "../../utils/http.js";

const SOURCE = "Web search";
const MAX_RELATED = 3;

const TopicSchema = z.object({
  Text: z.string().optional(),
  FirstURL: z.string().optional(),
});

const InstantAnswerSchema = z.object({
  AbstractText: z.string().default(""),
  AbstractSource: z.string().default(""),
  AbstractURL: z.string().default(""),
  RelatedTopics: z.array(TopicSchema).default([]),
});

export interface WebSnippet {
  /** `abstract` describes the searched book; `related` is about something near it. */
  kind: "abstract" | "related";
  title: string;
  url: string | null;
  text: string;
}

export interface WebSearchClientOptions {
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
}

export class WebSearchClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: WebSearchClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger.child({ source: SOURCE });
  }

  /** Abstract first, then up to three related-topic snippets. */
  async searchBookInfo(
    title: string,
    author: string,
    signal?: AbortSignal,
  ): Promise<WebSnippet[]> {
    const url = new URL(`${this.baseUrl}/`);
    url.searchParams.set("q", `${title} by ${author} book synopsis`);
    url.searchParams.set("format", "json");
    url.searchParams.set("no_html", "1");
    url.searchParams.set("no_redirect", "1");
    url.searchParams.set("skip_disambig", "1");

    try {
      const data = parseResponse(
        InstantAnswerSchema,
        await fetchJson(url, { source: SOURCE, timeoutMs: this.timeoutMs, signal }),
        SOURCE,
      );

      const snippets: WebSnippet[] = [];
      if (data.AbstractText.trim()) {
        snippets.push({
          kind: "abstract",
          title: data.AbstractSource ? `${title} - ${data.AbstractSource}` : title,
          url: data.AbstractURL || null,
          text: data.AbstractText.trim(),
        });
      }
      for (const topic of data.RelatedTopics.slice(0, MAX_RELATED)) {
        const text = topic.Text?.trim();
        if (!text) continue;
        snippets.push({ kind: "related", title: `Related: ${title}`, url: topic.FirstURL ?? null, text });
      }

      this.logger.debug({ title, snippets: snippets.length }, "Web search completed");
      return snippets;
    } catch (error: unknown) {
      throw toSourceError(error, SOURCE);
    }
  }
}

/** The abstract text, the only part fit to stand in for a description. */
export function abstractText(snippets: readonly WebSnippet[]): string {
  return snippets
    .filter((s) => s.kind === "abstract")
    .map((s) => s.text)
    .join("\n\n");
}

export function relatedTexts(snippets: readonly WebSnippet[]): string[] {
  return snippets.filter((s) => s.kind === "related").map((s) => s.text);
}
