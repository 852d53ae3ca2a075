// ---------------------------------------------------------------------------
// ISBN validation and ISBN-10 -> ISBN-13 normalisation.
// ---------------------------------------------------------------------------

import type { ISBN10, ISBN13, ISBNParseResult, RawISBN } from "../../core/types.js";

// ── Check digits ────────────────────────────────────────────────────────────

/** Check digit for the first 9 digits of an ISBN-10: '0'-'9' or 'X'. */
export function isbn10CheckDigit(first9: string): string {
  if (!/^\d{9}$/.test(first9)) {
    throw new Error(`Expected 9 digits, got "${first9}"`);
  }
  let sum = 0;
  for (let i = 0; i < 9; i++) {
    sum += (10 - i) * Number(first9[i]);
  }
  const check = (11 - (sum % 11)) % 11;
  return check === 10 ? "X" : String(check);
}

/** Check digit for the first 12 digits of an ISBN-13. */
export function isbn13CheckDigit(first12: string): string {
  if (!/^\d{12}$/.test(first12)) {
    throw new Error(`Expected 12 digits, got "${first12}"`);
  }
  let sum = 0;
  for (let i = 0; i < 12; i++) {
    sum += (i % 2 === 0 ? 1 : 3) * Number(first12[i]);
  }
  return String((10 - (sum % 10)) % 10);
}

// ── Validation ──────────────────────────────────────────────────────────────

/** Drop hyphens and whitespace; scanners and catalogs emit both. */
export function stripFormatting(raw: string): string {
  return raw.trim().replace(/[\s-]/g, "");
}

export function validateISBN10(raw: RawISBN): ISBN10 | null {
  const s = stripFormatting(raw).toUpperCase();
  if (!/^\d{9}[\dX]$/.test(s)) return null;
  if (s[9] !== isbn10CheckDigit(s.slice(0, 9))) return null;
  return s as ISBN10;
}

export function validateISBN13(raw: RawISBN): ISBN13 | null {
  const s = stripFormatting(raw);
  if (!/^\d{13}$/.test(s)) return null;
  if (s[12] !== isbn13CheckDigit(s.slice(0, 12))) return null;
  return s as ISBN13;
}

// ── Conversion ──────────────────────────────────────────────────────────────

export function isbn10ToISBN13(isbn10: ISBN10): ISBN13 {
  const prefix12 = "978" + isbn10.slice(0, 9);
  return (prefix12 + isbn13CheckDigit(prefix12)) as ISBN13;
}

/** 979-prefixed ISBN-13s have no ISBN-10 form. */
export function isbn13ToISBN10(isbn13: ISBN13): ISBN10 | null {
  if (!isbn13.startsWith("978")) return null;
  const body9 = isbn13.slice(3, 12);
  return (body9 + isbn10CheckDigit(body9)) as ISBN10;
}

/** Any valid ISBN in its ISBN-13 form, or `null`. */
export function toISBN13(raw: RawISBN): ISBN13 | null {
  const isbn13 = validateISBN13(raw);
  if (isbn13) return isbn13;
  const isbn10 = validateISBN10(raw);
  return isbn10 ? isbn10ToISBN13(isbn10) : null;
}

// ── Top-level parse ─────────────────────────────────────────────────────────

/**
 * Parse user or catalog input into both ISBN forms, or explain why it is not
 * an ISBN.
 */
export function parseISBN(raw: RawISBN): ISBNParseResult {
  const stripped = stripFormatting(raw).toUpperCase();

  if (stripped.length === 0) {
    return { ok: false, raw, reason: "Empty string" };
  }

  const isbn13 = validateISBN13(stripped);
  if (isbn13) {
    return { ok: true, isbn10: isbn13ToISBN10(isbn13), isbn13 };
  }

  const isbn10 = validateISBN10(stripped);
  if (isbn10) {
    return { ok: true, isbn10, isbn13: isbn10ToISBN13(isbn10) };
  }

  if (stripped.length !== 10 && stripped.length !== 13) {
    return {
      ok: false,
      raw,
      reason: `Invalid length: expected 10 or 13 characters, got ${stripped.length}`,
    };
  }
  if (stripped.length === 10 && !/^\d{9}[\dX]$/.test(stripped)) {
    return { ok: false, raw, reason: "ISBN-10 contains non-numeric characters" };
  }
  if (stripped.length === 13 && !/^\d{13}$/.test(stripped)) {
    return { ok: false, raw, reason: "ISBN-13 contains non-numeric characters" };
  }
  return { ok: false, raw, reason: "Invalid check digit" };
}
