// ---------------------------------------------------------------------------
// `shelfwright add`: wire the configured clients into the add pipeline.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { AppConfig, Output, Prompter } from "../../core/types.js";
import { SourceRole } from "../../core/types.js";
import { BaserowClient } from "../../baserow/baserow-client.js";
import { MediaWriter } from "../../baserow/media-writer.js";
import { createTextBackend } from "../../llm/create-backend.js";
import { BookSourceAggregator } from "../../orchestrator/book-aggregator.js";
import { addBook, type AddBookDeps, type AddBookOutcome } from "../../pipeline/add-book.js";
import { GoogleBooksSource } from "../../sources/google-books/google-books-source.js";
import { OpenLibrarySource } from "../../sources/open-library/open-library-source.js";
import { WebSearchClient } from "../../sources/web-search/web-search-client.js";
import type { CliCommand } from "../args.js";

type AddCommand = Extract<CliCommand, { command: "add" }>;

export interface CommandIo {
  prompter: Prompter;
  output: Output;
}

export function buildAddDeps(
  config: AppConfig,
  options: { web: boolean },
  io: CommandIo,
  logger: Logger,
): AddBookDeps {
  const timeoutMs = config.requestTimeoutMs;

  const primary = new GoogleBooksSource({
    baseUrl: config.googleBooks.baseUrl,
    apiKey: config.googleBooks.apiKey,
    maxResults: config.app.maxSearchResults,
    role: SourceRole.PRIMARY,
    timeoutMs,
    logger,
  });
  const fallback = new OpenLibrarySource({
    baseUrl: config.openLibrary.baseUrl,
    limit: config.app.maxSearchResults,
    role: SourceRole.FALLBACK,
    timeoutMs,
    logger,
  });
  const web =
    options.web && config.webSearch.enabled
      ? new WebSearchClient({ baseUrl: config.webSearch.baseUrl, timeoutMs, logger })
      : null;

  const baserow = new BaserowClient({
    baseUrl: config.baserow.baseUrl,
    apiToken: config.baserow.apiToken,
    timeoutMs,
    logger,
  });

  return {
    books: new BookSourceAggregator({
      primary,
      fallback,
      workDescriptions: fallback,
      web,
      minDescriptionWords: config.app.minSynopsisWords,
      logger,
    }),
    categoryRows: baserow,
    categoriesTableId: config.baserow.categoriesTableId,
    backend: createTextBackend(config, logger),
    writer: new MediaWriter({ store: baserow, config: config.baserow, timeoutMs, logger }),
    prompter: io.prompter,
    output: io.output,
    settings: config.app,
    logger,
  };
}

export function reportOutcome(outcome: AddBookOutcome, output: Output): void {
  if (outcome.status === "cancelled") {
    output.write(outcome.message);
    return;
  }

  const { result, record } = outcome;
  output.write(`Added "${record.title}" as row ${result.rowId}.`);
  switch (result.cover.status) {
    case "attached":
      output.write(`Cover attached: ${result.cover.fileName}`);
      break;
    case "skipped":
      output.write(`Cover not attached: ${result.cover.reason}`);
      break;
    case "failed":
      output.write(
        `Warning: the row was created but the cover could not be attached (${result.cover.error.message}). ` +
          `Attach it by hand to row ${result.rowId}.`,
      );
      break;
  }
}

export async function runAdd(
  command: AddCommand,
  config: AppConfig,
  io: CommandIo,
  logger: Logger,
): Promise<AddBookOutcome> {
  const deps = buildAddDeps(config, { web: command.web }, io, logger);
  const outcome = await addBook(
    { input: command.input, classification: command.classification },
    deps,
  );
  reportOutcome(outcome, io.output);
  return outcome;
}
