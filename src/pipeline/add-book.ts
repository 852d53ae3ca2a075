// ---------------------------------------------------------------------------
// The add pipeline: query -> candidates -> selection -> enrichment ->
// categories -> synopsis -> confirmation -> one row.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  BookCandidate,
  MediaClassification,
  MediaRecord,
  Output,
  PipelineConfig,
  Prompter,
  SearchQuery,
  WriteResult,
} from "../core/types.js";
import {
  ConfirmationDeclinedError,
  SelectionAbortedError,
  describeQuery,
} from "../core/errors.js";
import type { MediaWriter } from "../baserow/media-writer.js";
import { composeMediaRecord, confirmRecord } from "../composer/record-composer.js";
import { resolveSearchQuery, type RawSearchInput } from "../domain/query/search-query.js";
import type { TextBackend } from "../llm/text-backend.js";
import { candidateLabel, selectCandidate } from "../orchestrator/ambiguity-resolver.js";
import type { BookSourceAggregator } from "../orchestrator/book-aggregator.js";
import {
  fetchCategorySet,
  resolveCategories,
  type CategoryRowSource,
} from "../orchestrator/category-resolver.js";
import { produceSynopsis } from "../orchestrator/synopsis-generator.js";

export interface AddBookRequest {
  input: RawSearchInput;
  classification: MediaClassification;
}

export interface AddBookDeps {
  books: Pick<BookSourceAggregator, "findCandidates" | "enrich">;
  categoryRows: CategoryRowSource;
  categoriesTableId: number;
  backend: TextBackend;
  writer: Pick<MediaWriter, "write">;
  prompter: Prompter;
  output: Output;
  settings: PipelineConfig;
  logger: Logger;
  /** Delay between category re-asks; tests pass 0. */
  retryDelayMs?: number;
}

export type AddBookOutcome =
  | { status: "created"; record: MediaRecord; result: WriteResult }
  | { status: "cancelled"; stage: "selection" | "confirmation"; message: string };

async function chooseCandidate(
  query: SearchQuery,
  deps: AddBookDeps,
): Promise<BookCandidate> {
  deps.output.write(`Looking up ${describeQuery(query)}...`);
  const candidates = await deps.books.findCandidates(query);
  const chosen = await selectCandidate(candidates, deps.prompter, deps.output, {
    maxResults: deps.settings.maxSearchResults,
    descriptionPreviewChars: deps.settings.descriptionPreviewChars,
  });
  deps.output.write(`Selected: ${candidateLabel(chosen)}`);
  return deps.books.enrich(chosen);
}

/**
 * Run one add. Every network step is awaited in order; nothing is written
 * unless the user answers yes at the confirmation prompt.
 */
export async function addBook(request: AddBookRequest, deps: AddBookDeps): Promise<AddBookOutcome> {
  const logger = deps.logger.child({ module: "add-book" });
  const query = resolveSearchQuery(request.input);
  logger.debug({ query }, "query resolved");

  let book: BookCandidate;
  try {
    book = await chooseCandidate(query, deps);
  } catch (error: unknown) {
    if (error instanceof SelectionAbortedError) {
      return { status: "cancelled", stage: "selection", message: error.message };
    }
    throw error;
  }

  deps.output.write("Fetching categories from Baserow...");
  const set = await fetchCategorySet(deps.categoryRows, deps.categoriesTableId);
  logger.debug({ categories: set.size }, "category set loaded");

  deps.output.write("Choosing categories...");
  const categories = await resolveCategories(deps.backend, book, set, {
    attempts: deps.settings.categoryAttempts,
    retryDelayMs: deps.retryDelayMs,
    logger,
  });

  const synopsis = await produceSynopsis(deps.backend, book, {
    minWords: deps.settings.minSynopsisWords,
    targetWords: deps.settings.targetSynopsisWords,
  });
  logger.debug({ origin: synopsis.origin }, "synopsis ready");

  const record = composeMediaRecord(book, synopsis, categories, request.classification);

  try {
    await confirmRecord(record, deps.prompter, deps.output);
  } catch (error: unknown) {
    if (error instanceof ConfirmationDeclinedError) {
      return { status: "cancelled", stage: "confirmation", message: error.message };
    }
    throw error;
  }

  const result = await deps.writer.write(record);
  return { status: "created", record, result };
}
