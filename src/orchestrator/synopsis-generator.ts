// ---------------------------------------------------------------------------
// Synopsis generator: keep a long-enough sourced description, otherwise ask
// the text backend for one.
// ---------------------------------------------------------------------------

import type { BookCandidate } from "../core/types.js";
import { BackendContractError } from "../core/errors.js";
import { authorsLine, countWords, fullTitle } from "../domain/book/candidate.js";
import type { TextBackend } from "../llm/text-backend.js";

export interface SynopsisOptions {
  /** Descriptions with at least this many words are used verbatim. */
  minWords: number;
  /** Length requested from the backend; not enforced on its reply. */
  targetWords: number;
}

export interface Synopsis {
  text: string;
  origin: "source" | "generated";
}

const HEADING = /^(?:\*\*\s*synopsis\s*:?\s*\*\*|#+\s*synopsis|synopsis)\s*:?\s*/i;

export function buildSynopsisPrompt(book: BookCandidate, targetWords: number): string {
  const lines = [
    `Write a synopsis of approximately ${targetWords} words for the book below, suitable for a library catalogue.`,
    "",
    "BOOK:",
    `Title: ${fullTitle(book)}`,
    `Authors: ${authorsLine(book.authors)}`,
  ];
  if (book.publishedDate) lines.push(`Published: ${book.publishedDate}`);
  if (book.subjects.length > 0) lines.push(`Subjects: ${book.subjects.slice(0, 10).join(", ")}`);
  if (book.description) lines.push(`Known description: ${book.description}`);
  if (book.webNotes.length > 0) {
    lines.push(
      "Web search notes (may be about the author or setting rather than this book):",
      ...book.webNotes.map((note) => `- ${note}`),
    );
  }
  lines.push(
    "",
    "INSTRUCTIONS:",
    "- Cover the main themes, setting and key characters.",
    "- Do not reveal major plot twists or the ending.",
    `- Aim for about ${targetWords} words of plain prose, no headings or lists.`,
    "",
    "SYNOPSIS:",
  );
  return lines.join("\n");
}

/** Trim the reply and drop a leading "Synopsis:" style heading. */
export function cleanSynopsis(raw: string): string {
  return raw.trim().replace(HEADING, "").trim();
}

/**
 * Return the sourced description when it reaches `minWords`; otherwise make
 * exactly one backend call.
 */
export async function produceSynopsis(
  backend: TextBackend,
  book: BookCandidate,
  options: SynopsisOptions,
): Promise<Synopsis> {
  if (book.description && countWords(book.description) >= options.minWords) {
    return { text: book.description, origin: "source" };
  }

  const reply = await backend.generate(buildSynopsisPrompt(book, options.targetWords), {
    maxTokens: Math.max(256, Math.ceil(options.targetWords * 2.5)),
  });
  const text = cleanSynopsis(reply);
  if (!text) {
    throw new BackendContractError("Backend returned an empty synopsis", reply);
  }
  return { text, origin: "generated" };
}
