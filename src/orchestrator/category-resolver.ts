// ---------------------------------------------------------------------------
// Category resolver: ask the text backend for 3-5 labels from a fixed set.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { BookCandidate, CategoryLabel } from "../core/types.js";
import { BackendContractError, CategorySetEmptyError } from "../core/errors.js";
import { authorsLine, fullTitle, truncate } from "../domain/book/candidate.js";
import { CategorySet, type CategoryRow } from "../domain/categories/category-set.js";
import type { TextBackend } from "../llm/text-backend.js";
import { withRetry } from "./retry.js";

export const MIN_CATEGORIES = 3;
export const MAX_CATEGORIES = 5;

/** Descriptions beyond this many characters are cut before prompting. */
const PROMPT_DESCRIPTION_CHARS = 2000;

export interface CategoryRowSource {
  listRows(tableId: number, options?: { size?: number }): Promise<CategoryRow[]>;
}

/**
 * One read of the categories table. Whatever comes back in that page is the
 * admissible set for this invocation.
 */
export async function fetchCategorySet(
  store: CategoryRowSource,
  tableId: number,
): Promise<CategorySet> {
  const rows = await store.listRows(tableId, { size: 200 });
  const set = CategorySet.fromRows(rows);
  if (set.size === 0) throw new CategorySetEmptyError(tableId);
  return set;
}

export function buildCategoryPrompt(book: BookCandidate, set: CategorySet): string {
  const lines = [
    `You are a librarian cataloguing a personal book collection. Choose between ${MIN_CATEGORIES} and ${MAX_CATEGORIES} categories for the book below.`,
    "",
    "BOOK:",
    `Title: ${fullTitle(book)}`,
    `Authors: ${authorsLine(book.authors)}`,
  ];
  if (book.subjects.length > 0) {
    lines.push(`Subjects: ${book.subjects.slice(0, 10).join(", ")}`);
  }
  if (book.description) {
    lines.push(`Description: ${truncate(book.description, PROMPT_DESCRIPTION_CHARS)}`);
  }
  lines.push(
    "",
    "ALLOWED CATEGORIES (use these names exactly; never invent, rename or merge categories):",
    ...set.names().map((name) => `- ${name}`),
    "",
    `Reply with ${MIN_CATEGORIES} to ${MAX_CATEGORIES} of the category names above, one per line, and nothing else.`,
  );
  return lines.join("\n");
}

/**
 * Strip list bullets, numbering and wrapping quotes from one reply entry.
 * A closing full stop is dropped unless the label itself ends with one.
 */
function cleanEntry(raw: string, set: CategorySet): string {
  const entry = raw
    .trim()
    .replace(/^(?:[-*•]\s+|\d+[.)]\s+)/, "")
    .replace(/^["'`*]+|["'`*]+$/g, "")
    .trim();
  if (entry.endsWith(".") && set.findByName(entry) === undefined) {
    return entry.slice(0, -1).trimEnd();
  }
  return entry;
}

/**
 * Split one reply line on commas, except where consecutive pieces rejoin
 * into a label name that itself contains a comma. The longest match wins.
 */
function splitLine(line: string, set: CategorySet): string[] {
  const parts = line.split(",");
  const entries: string[] = [];
  let i = 0;
  while (i < parts.length) {
    let matched = false;
    for (let j = parts.length; j > i + 1; j--) {
      const joined = cleanEntry(parts.slice(i, j).join(","), set);
      if (set.findByName(joined) !== undefined) {
        entries.push(joined);
        i = j;
        matched = true;
        break;
      }
    }
    if (!matched) {
      entries.push(cleanEntry(parts[i], set));
      i++;
    }
  }
  return entries;
}

/**
 * Parse a backend reply into labels from `set`.
 *
 * Every entry must equal a label name exactly; there must be 3-5 distinct
 * entries. Anything else is a {@link BackendContractError}; nothing is
 * coerced or partially accepted.
 */
export function parseCategoryResponse(response: string, set: CategorySet): CategoryLabel[] {
  const entries = response
    .split("\n")
    .flatMap((line) => splitLine(line, set))
    .filter((e) => e.length > 0);

  if (entries.length === 0) {
    throw new BackendContractError("Backend returned no categories", response);
  }

  const distinct = [...new Set(entries)];
  const unknown = distinct.filter((name) => set.findByName(name) === undefined);
  if (unknown.length > 0) {
    throw new BackendContractError(
      `Backend chose categories outside the allowed set: ${unknown.map((u) => `"${u}"`).join(", ")}`,
      response,
    );
  }

  if (distinct.length < MIN_CATEGORIES || distinct.length > MAX_CATEGORIES) {
    throw new BackendContractError(
      `Backend chose ${distinct.length} categories; expected ${MIN_CATEGORIES} to ${MAX_CATEGORIES}`,
      response,
    );
  }

  const labels: CategoryLabel[] = [];
  for (const name of distinct) {
    const label = set.findByName(name);
    if (label && set.contains(label)) labels.push(label);
  }
  return labels;
}

export interface ResolveCategoriesOptions {
  /** Total prompts allowed, including the first. */
  attempts: number;
  retryDelayMs?: number;
  logger: Logger;
}

/**
 * Ask `backend` for categories, re-asking while it breaks the contract.
 * Transport failures from the backend are not retried.
 */
export function resolveCategories(
  backend: TextBackend,
  book: BookCandidate,
  set: CategorySet,
  options: ResolveCategoriesOptions,
): Promise<CategoryLabel[]> {
  const prompt = buildCategoryPrompt(book, set);
  const logger = options.logger.child({ module: "categories" });

  return withRetry(
    async () => {
      const response = await backend.generate(prompt, { temperature: 0.2 });
      const labels = parseCategoryResponse(response, set);
      logger.debug({ labels: labels.map((l) => l.name) }, "categories chosen");
      return labels;
    },
    {
      maxRetries: Math.max(0, options.attempts - 1),
      baseDelayMs: options.retryDelayMs ?? 250,
      onRetry: (error, retry) =>
        logger.warn(
          { retry, reason: error instanceof Error ? error.message : String(error) },
          "category reply rejected; asking again",
        ),
    },
  );
}
