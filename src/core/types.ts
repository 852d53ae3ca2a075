// ---------------------------------------------------------------------------
// Core types for Shelfwright.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Branded primitives ──────────────────────────────────────────────────────

/** A validated ISBN-10 string (9 digits + check digit). */
export type ISBN10 = string & { readonly __brand: "ISBN10" };

/** A validated ISBN-13 string (13 digits). */
export type ISBN13 = string & { readonly __brand: "ISBN13" };

/** Unvalidated ISBN input. */
export type RawISBN = string;

export type ISBNParseResult =
  | { ok: true; isbn10: ISBN10 | null; isbn13: ISBN13 }
  | { ok: false; raw: RawISBN; reason: string };

// ── Enums ───────────────────────────────────────────────────────────────────

export const SourceRole = {
  PRIMARY: "primary",
  FALLBACK: "fallback",
  WEB_ENRICHMENT: "web-enrichment",
} as const;
export type SourceRole = (typeof SourceRole)[keyof typeof SourceRole];

export const MediaClassification = {
  EBOOK: "ebook",
  PHYSICAL: "physical",
} as const;
export type MediaClassification =
  (typeof MediaClassification)[keyof typeof MediaClassification];

export const LlmProvider = {
  OPENAI: "openai",
  ANTHROPIC: "anthropic",
  OLLAMA: "ollama",
} as const;
export type LlmProvider = (typeof LlmProvider)[keyof typeof LlmProvider];

export const CoverMode = {
  URL: "url",
  UPLOAD: "upload",
  NONE: "none",
} as const;
export type CoverMode = (typeof CoverMode)[keyof typeof CoverMode];

// ── Search input ────────────────────────────────────────────────────────────

export type SearchQuery =
  | { readonly kind: "isbn"; readonly isbn13: ISBN13; readonly raw: string }
  | { readonly kind: "title-author"; readonly title: string; readonly author: string };

// ── Book candidates ─────────────────────────────────────────────────────────

export interface BookIdentifiers {
  isbn13?: ISBN13;
  isbn10?: ISBN10;
  /** Source-native key: a Google volume id or an Open Library work key. */
  sourceId?: string;
}

export interface BookCandidate {
  readonly title: string;
  readonly subtitle: string | null;
  readonly authors: readonly string[];
  readonly description: string | null;
  readonly identifiers: Readonly<BookIdentifiers>;
  readonly coverUrl: string | null;
  readonly publishedDate: string | null;
  readonly publisher: string | null;
  readonly pageCount: number | null;
  readonly subjects: readonly string[];
  /** Related web-search text; fed to the synopsis prompt, never stored. */
  readonly webNotes: readonly string[];
  readonly source: SourceRole;
  /** Human-readable provenance, e.g. "Google Books". */
  readonly sourceName: string;
}

/**
 * Every book-data source implements this interface.
 * The aggregator decides which source is primary and which is fallback.
 */
export interface BookSource {
  readonly name: string;

  searchByIsbn(isbn: ISBN13, signal?: AbortSignal): Promise<BookCandidate[]>;

  searchByTitleAuthor(
    title: string,
    author: string,
    signal?: AbortSignal,
  ): Promise<BookCandidate[]>;
}

// ── Categories & records ────────────────────────────────────────────────────

export interface CategoryLabel {
  readonly id: number;
  readonly name: string;
  readonly description: string | null;
}

export interface MediaRecord {
  readonly title: string;
  readonly authors: readonly string[];
  readonly isbn13: ISBN13 | null;
  readonly synopsis: string;
  readonly synopsisOrigin: "source" | "generated";
  readonly categories: readonly CategoryLabel[];
  readonly classification: MediaClassification;
  readonly coverUrl: string | null;
}

export type CoverAttachOutcome =
  | { status: "attached"; fileName: string }
  | { status: "skipped"; reason: string }
  | { status: "failed"; error: Error };

export interface WriteResult {
  rowId: number;
  cover: CoverAttachOutcome;
}

// ── Interaction seams ───────────────────────────────────────────────────────

/** Blocking, line-oriented user input. */
export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

/** User-facing text output (stdout), kept apart from the logger. */
export interface Output {
  write(text: string): void;
}

// ── Config types ────────────────────────────────────────────────────────────

export interface AppConfig {
  logLevel: string;
  requestTimeoutMs: number;
  googleBooks: GoogleBooksConfig;
  openLibrary: OpenLibraryConfig;
  webSearch: WebSearchConfig;
  baserow: BaserowConfig;
  llm: LlmConfig;
  app: PipelineConfig;
}

export interface GoogleBooksConfig {
  apiKey: string;
  baseUrl: string;
}

export interface OpenLibraryConfig {
  baseUrl: string;
}

export interface WebSearchConfig {
  enabled: boolean;
  baseUrl: string;
}

export interface BaserowFieldNames {
  title: string;
  author: string;
  isbn: string;
  synopsis: string;
  category: string;
  mediaType: string;
  cover: string;
  read: string;
  rating: string;
  status: string;
}

/** Values set on every new row; unset entries are left out of the payload. */
export interface BaserowRowDefaults {
  read?: boolean;
  rating?: number;
  /** Single-select option id for the status field. */
  status?: number;
}

export interface BaserowConfig {
  apiToken: string;
  baseUrl: string;
  databaseId: number;
  mediaTableId: number;
  categoriesTableId: number;
  fields: BaserowFieldNames;
  /** Single-select option ids for the media type field, when known. */
  mediaTypeOptionIds: Partial<Record<MediaClassification, number>>;
  rowDefaults: BaserowRowDefaults;
  coverMode: CoverMode;
}

export interface LlmConfig {
  provider: LlmProvider;
  /** Per-call timeout for text backends; generation runs longer than lookups. */
  timeoutMs: number;
  openai: { apiKey: string; model: string; baseUrl: string };
  anthropic: { apiKey: string; model: string; baseUrl: string };
  ollama: { baseUrl: string; model: string };
}

export interface PipelineConfig {
  maxSearchResults: number;
  descriptionPreviewChars: number;
  minSynopsisWords: number;
  targetSynopsisWords: number;
  categoryAttempts: number;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  redactSecrets: boolean;
}
