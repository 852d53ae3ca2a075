import { describe, it, expect } from "vitest";

import { resolveSearchQuery } from "../../../src/domain/query/search-query.js";
import { InputValidationError } from "../../../src/core/errors.js";

describe("resolveSearchQuery", () => {
  it("normalises an ISBN-10 to ISBN-13", () => {
    expect(resolveSearchQuery({ isbn: "0-306-40615-2" })).toEqual({
      kind: "isbn",
      isbn13: "9780306406157",
      raw: "0-306-40615-2",
    });
  });

  it("prefers the ISBN when title and author are also given", () => {
    const query = resolveSearchQuery({
      isbn: "9780345391803",
      title: "Something Else",
      author: "Someone",
    });
    expect(query.kind).toBe("isbn");
  });

  it("builds a trimmed title/author query", () => {
    expect(resolveSearchQuery({ title: "  The Hobbit ", author: " J.R.R. Tolkien" })).toEqual({
      kind: "title-author",
      title: "The Hobbit",
      author: "J.R.R. Tolkien",
    });
  });

  it("returns a frozen query", () => {
    expect(Object.isFrozen(resolveSearchQuery({ isbn: "9780345391803" }))).toBe(true);
  });

  it("rejects an ISBN with a bad check digit", () => {
    expect(() => resolveSearchQuery({ isbn: "9780345391804" })).toThrow(
      'Invalid ISBN "9780345391804": Invalid check digit',
    );
  });

  it("rejects a title without an author", () => {
    expect(() => resolveSearchQuery({ title: "The Hobbit" })).toThrow(InputValidationError);
  });

  it("rejects blank input", () => {
    expect(() => resolveSearchQuery({ isbn: "  ", title: " ", author: "" })).toThrow(
      "Provide either --isbn or both --title and --author",
    );
  });
});
