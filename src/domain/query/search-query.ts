// ---------------------------------------------------------------------------
// Input resolver: CLI flags -> canonical SearchQuery.
// ---------------------------------------------------------------------------

import type { SearchQuery } from "../../core/types.js";
import { InputValidationError } from "../../core/errors.js";
import { parseISBN } from "../isbn/isbn.js";

export interface RawSearchInput {
  isbn?: string;
  title?: string;
  author?: string;
}

/**
 * An ISBN takes precedence over title/author when both are supplied.
 * Title and author must both be present; either alone is ambiguous.
 */
export function resolveSearchQuery(input: RawSearchInput): SearchQuery {
  const isbn = input.isbn?.trim();
  if (isbn) {
    const parsed = parseISBN(isbn);
    if (!parsed.ok) {
      throw new InputValidationError(`Invalid ISBN "${isbn}": ${parsed.reason}`);
    }
    const query: SearchQuery = { kind: "isbn", isbn13: parsed.isbn13, raw: isbn };
    return Object.freeze(query);
  }

  const title = input.title?.trim() ?? "";
  const author = input.author?.trim() ?? "";
  if (title && author) {
    const query: SearchQuery = { kind: "title-author", title, author };
    return Object.freeze(query);
  }

  throw new InputValidationError(
    "Provide either --isbn or both --title and --author",
  );
}
