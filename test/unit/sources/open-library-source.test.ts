// ---------------------------------------------------------------------------
// OpenLibrarySource against a stubbed fetch.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { OpenLibrarySource } from "../../../src/sources/open-library/open-library-source.js";
import { SourceRole } from "../../../src/core/types.js";
import { validateISBN13 } from "../../../src/domain/isbn/isbn.js";
import { SourceHttpError } from "../../../src/core/errors.js";
import { createSilentLogger, jsonResponse } from "../../helpers/fakes.js";

function makeSource() {
  return new OpenLibrarySource({
    baseUrl: "https://ol.example.test",
    coversBaseUrl: "https://covers.example.test",
    limit: 5,
    role: SourceRole.FALLBACK,
    timeoutMs: 1000,
    logger: createSilentLogger(),
  });
}

const hobbitDoc = {
  key: "/works/OL1W",
  title: "The Hobbit",
  author_name: ["J.R.R. Tolkien"],
  first_publish_year: 1937,
  publish_year: [1937, 1966, 2001],
  publisher: ["Test Press", "Other Press"],
  number_of_pages_median: 310,
  isbn: ["0-306-40615-2", "9780306406157"],
  cover_i: 42,
  subject: ["Fantasy", "Dragons"],
};

describe("OpenLibrarySource", () => {
  const originalFetch = globalThis.fetch;
  let mockFetch: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    mockFetch = vi.fn();
    globalThis.fetch = mockFetch;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  it("maps search docs to fallback candidates", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ numFound: 1, docs: [hobbitDoc] }));

    const [c] = await makeSource().searchByTitleAuthor("The Hobbit", "Tolkien");

    expect(c.title).toBe("The Hobbit");
    expect(c.authors).toEqual(["J.R.R. Tolkien"]);
    expect(c.description).toBeNull();
    expect(c.identifiers).toEqual({
      isbn13: "9780306406157",
      isbn10: "0306406152",
      sourceId: "/works/OL1W",
    });
    expect(c.coverUrl).toBe("https://covers.example.test/b/id/42-L.jpg");
    expect(c.publishedDate).toBe("2001");
    expect(c.publisher).toBe("Test Press");
    expect(c.pageCount).toBe(310);
    expect(c.source).toBe("fallback");
    expect(c.sourceName).toBe("Open Library");

    const url = new URL(String(mockFetch.mock.calls[0][0]));
    expect(url.pathname).toBe("/search.json");
    expect(url.searchParams.get("title")).toBe("The Hobbit");
    expect(url.searchParams.get("author")).toBe("Tolkien");
    expect(url.searchParams.get("limit")).toBe("5");
  });

  it("stamps the queried ISBN on ISBN searches", async () => {
    const queried = validateISBN13("9780345391803");
    if (!queried) throw new Error("fixture");
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ docs: [{ key: "/works/OL2W", title: "The Lord of the Rings" }] }),
    );

    const [c] = await makeSource().searchByIsbn(queried);

    expect(c.identifiers.isbn13).toBe("9780345391803");
    expect(c.publishedDate).toBeNull();
    expect(c.coverUrl).toBeNull();
    expect(new URL(String(mockFetch.mock.calls[0][0])).searchParams.get("isbn")).toBe(
      "9780345391803",
    );
  });

  it("returns an empty list when nothing matches", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ numFound: 0, docs: [] }));
    expect(await makeSource().searchByTitleAuthor("Nothing", "Nobody")).toEqual([]);
  });

  it("reads a work description in either shape", async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ description: "  Plain text.  " }))
      .mockResolvedValueOnce(jsonResponse({ description: { type: "/type/text", value: "Typed." } }))
      .mockResolvedValueOnce(jsonResponse({ title: "No description" }));

    const source = makeSource();
    expect(await source.fetchWorkDescription("/works/OL1W")).toBe("Plain text.");
    expect(await source.fetchWorkDescription("/works/OL1W")).toBe("Typed.");
    expect(await source.fetchWorkDescription("/works/OL1W")).toBeNull();
    expect(String(mockFetch.mock.calls[0][0])).toBe("https://ol.example.test/works/OL1W.json");
  });

  it("does not look up keys that are not works", async () => {
    expect(await makeSource().fetchWorkDescription("/books/OL1M")).toBeNull();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("raises SourceHttpError on a server error", async () => {
    mockFetch.mockResolvedValueOnce(new Response("down", { status: 503 }));
    await expect(makeSource().searchByTitleAuthor("A", "B")).rejects.toThrow(
      "Open Library returned HTTP 503",
    );
    mockFetch.mockResolvedValueOnce(new Response("down", { status: 503 }));
    await expect(makeSource().searchByTitleAuthor("A", "B")).rejects.toBeInstanceOf(SourceHttpError);
  });
});
