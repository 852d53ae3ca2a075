// ---------------------------------------------------------------------------
// Error hierarchy for Shelfwright.
// ---------------------------------------------------------------------------

import type { SearchQuery } from "./types.js";

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all Shelfwright domain errors.
 */
export class ShelfwrightError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ShelfwrightError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function describeQuery(query: SearchQuery): string {
  return query.kind === "isbn"
    ? `ISBN ${query.isbn13}`
    : `title "${query.title}" by "${query.author}"`;
}

// ── Book source errors ──────────────────────────────────────────────────────

/**
 * A book-data source could not answer. The aggregator treats every subclass
 * as a fallback trigger.
 */
export class SourceUnavailableError extends ShelfwrightError {
  public readonly source: string;

  constructor(message: string, source: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SourceUnavailableError";
    this.source = source;
  }
}

/** The source could not be reached over the network. */
export class SourceConnectionError extends SourceUnavailableError {
  constructor(message: string, source: string, options?: ErrorOptions) {
    super(message, source, options);
    this.name = "SourceConnectionError";
  }
}

/** The source's request exceeded the per-call deadline. */
export class SourceTimeoutError extends SourceUnavailableError {
  constructor(message: string, source: string, options?: ErrorOptions) {
    super(message, source, options);
    this.name = "SourceTimeoutError";
  }
}

/** The source answered with a non-2xx status. */
export class SourceHttpError extends SourceUnavailableError {
  public readonly status: number;

  constructor(source: string, status: number, options?: ErrorOptions) {
    super(`${source} returned HTTP ${status}`, source, options);
    this.name = "SourceHttpError";
    this.status = status;
  }
}

/** The source's response body could not be parsed. */
export class SourceParseError extends SourceUnavailableError {
  constructor(message: string, source: string, options?: ErrorOptions) {
    super(message, source, options);
    this.name = "SourceParseError";
  }
}

/** Every source was tried and none produced a candidate. */
export class BookNotFoundError extends ShelfwrightError {
  public readonly query: SearchQuery;

  constructor(query: SearchQuery, options?: ErrorOptions) {
    super(`No books found for ${describeQuery(query)}`, options);
    this.name = "BookNotFoundError";
    this.query = query;
  }
}

/** The fallback source failed after the primary failed or came back empty. */
export class AllSourcesFailedError extends ShelfwrightError {
  public readonly query: SearchQuery;
  public readonly failures: readonly SourceUnavailableError[];

  constructor(query: SearchQuery, failures: SourceUnavailableError[]) {
    const detail = failures.map((f) => f.message).join("; ");
    super(`No book data available for ${describeQuery(query)}: ${detail}`, {
      cause: failures[failures.length - 1],
    });
    this.name = "AllSourcesFailedError";
    this.query = query;
    this.failures = failures;
  }
}

// ── Interaction errors ──────────────────────────────────────────────────────

/** The user cancelled or gave an unusable answer to the candidate list. */
export class SelectionAbortedError extends ShelfwrightError {
  public readonly answer: string;

  constructor(message: string, answer: string) {
    super(message);
    this.name = "SelectionAbortedError";
    this.answer = answer;
  }
}

/** The user did not confirm the composed record. */
export class ConfirmationDeclinedError extends ShelfwrightError {
  constructor() {
    super("Cancelled; nothing was written");
    this.name = "ConfirmationDeclinedError";
  }
}

/** CLI input could not be turned into a search query. */
export class InputValidationError extends ShelfwrightError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InputValidationError";
  }
}

// ── Text backend errors ─────────────────────────────────────────────────────

/** The text backend could not be called or returned a transport error. */
export class TextBackendError extends ShelfwrightError {
  public readonly provider: string;

  constructor(message: string, provider: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TextBackendError";
    this.provider = provider;
  }
}

/**
 * The text backend answered, but the answer breaks the contract of the step
 * that asked: unknown labels, wrong cardinality or unusable text.
 */
export class BackendContractError extends ShelfwrightError {
  public readonly response: string;

  constructor(message: string, response: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BackendContractError";
    this.response = response;
  }
}

// ── Baserow errors ──────────────────────────────────────────────────────────

export class BaserowError extends ShelfwrightError {
  public readonly status: number | null;

  constructor(message: string, status: number | null, options?: ErrorOptions) {
    super(message, options);
    this.name = "BaserowError";
    this.status = status;
  }
}

/** The API token was rejected. */
export class BaserowAuthError extends BaserowError {
  constructor(status: number, options?: ErrorOptions) {
    super("Baserow authentication failed; check your API token", status, options);
    this.name = "BaserowAuthError";
  }
}

/** A table, row or endpoint does not exist. */
export class BaserowNotFoundError extends BaserowError {
  public readonly resource: string;

  constructor(resource: string, options?: ErrorOptions) {
    super(`Baserow resource not found: ${resource}`, 404, options);
    this.name = "BaserowNotFoundError";
    this.resource = resource;
  }
}

/** Any other failed Baserow request; `body` is the server's reply verbatim. */
export class BaserowRequestError extends BaserowError {
  public readonly body: string;

  constructor(
    action: string,
    status: number | null,
    body: string,
    options?: ErrorOptions,
  ) {
    const suffix = status === null ? body : `HTTP ${status}${body ? ` - ${body}` : ""}`;
    super(`Failed to ${action}: ${suffix}`, status, options);
    this.name = "BaserowRequestError";
    this.body = body;
  }
}

/** The categories table returned no usable labels. */
export class CategorySetEmptyError extends ShelfwrightError {
  public readonly tableId: number;

  constructor(tableId: number) {
    super(`No categories found in Baserow table ${tableId}`);
    this.name = "CategorySetEmptyError";
    this.tableId = tableId;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends ShelfwrightError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** The command line could not be understood. */
export class UsageError extends ShelfwrightError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "UsageError";
  }
}
