// ---------------------------------------------------------------------------
// BookCandidate construction and display helpers.
// ---------------------------------------------------------------------------

import type { BookCandidate, BookIdentifiers, SourceRole } from "../../core/types.js";

export interface CandidateInit {
  title: string;
  subtitle?: string | null;
  authors?: readonly string[];
  description?: string | null;
  identifiers?: BookIdentifiers;
  coverUrl?: string | null;
  publishedDate?: string | null;
  publisher?: string | null;
  pageCount?: number | null;
  subjects?: readonly string[];
  webNotes?: readonly string[];
  source: SourceRole;
  sourceName: string;
}

/** Build a frozen candidate; candidates are never mutated after creation. */
export function createCandidate(init: CandidateInit): BookCandidate {
  const description = init.description?.trim();
  return Object.freeze({
    title: init.title.trim(),
    subtitle: init.subtitle?.trim() || null,
    authors: Object.freeze([...(init.authors ?? [])]),
    description: description ? description : null,
    identifiers: Object.freeze({ ...init.identifiers }),
    coverUrl: init.coverUrl ?? null,
    publishedDate: init.publishedDate ?? null,
    publisher: init.publisher ?? null,
    pageCount: init.pageCount ?? null,
    subjects: Object.freeze([...(init.subjects ?? [])]),
    webNotes: Object.freeze([...(init.webNotes ?? [])]),
    source: init.source,
    sourceName: init.sourceName,
  });
}

/** Copy of `candidate` with a new description and provenance. */
export function withDescription(
  candidate: BookCandidate,
  description: string,
  source: SourceRole = candidate.source,
): BookCandidate {
  return createCandidate({ ...candidate, identifiers: { ...candidate.identifiers }, description, source });
}

export function withWebNotes(candidate: BookCandidate, notes: readonly string[]): BookCandidate {
  return createCandidate({
    ...candidate,
    identifiers: { ...candidate.identifiers },
    webNotes: notes,
  });
}

export function fullTitle(candidate: BookCandidate): string {
  return candidate.subtitle
    ? `${candidate.title}: ${candidate.subtitle}`
    : candidate.title;
}

export function authorsLine(authors: readonly string[]): string {
  return authors.length > 0 ? authors.join(", ") : "Unknown Author";
}

/** First four-digit year in the published date, if any. */
export function publicationYear(candidate: BookCandidate): string | null {
  const match = candidate.publishedDate?.match(/\d{4}/);
  return match ? match[0] : null;
}

/** Cut `text` to at most `max` characters, marking the cut with "...". */
export function truncate(text: string, max: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  if (flat.length <= max) return flat;
  return `${flat.slice(0, Math.max(0, max - 3)).trimEnd()}...`;
}

/** Google Books descriptions sometimes carry light HTML markup. */
export function stripMarkup(text: string): string {
  return text
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/p>/gi, "\n")
    .replace(/<[^>]+>/g, "")
    .replace(/&amp;/g, "&")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/[ \t]+/g, " ")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function countWords(text: string | null | undefined): number {
  if (!text) return 0;
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}
