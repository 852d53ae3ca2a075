// ---------------------------------------------------------------------------
// Ambiguity resolver: numbered candidate list + one blocking selection.
// ---------------------------------------------------------------------------

import type { BookCandidate, Output, Prompter } from "../core/types.js";
import { SelectionAbortedError } from "../core/errors.js";
import {
  authorsLine,
  fullTitle,
  publicationYear,
  truncate,
} from "../domain/book/candidate.js";

export interface AmbiguityOptions {
  /** At most this many candidates are shown and selectable. */
  maxResults: number;
  /** Character budget for each description preview. */
  descriptionPreviewChars: number;
}

const CANCEL_WORDS = new Set(["0", "q", "quit", "cancel"]);

export function candidateLabel(candidate: BookCandidate): string {
  const year = publicationYear(candidate) ?? "Unknown year";
  return `${fullTitle(candidate)} by ${authorsLine(candidate.authors)} (${year})`;
}

/** Lines for the first `maxResults` candidates plus a cancel entry. */
export function renderCandidateList(
  candidates: readonly BookCandidate[],
  options: AmbiguityOptions,
): string[] {
  const shown = candidates.slice(0, Math.max(1, options.maxResults));
  const lines: string[] = [];
  shown.forEach((candidate, i) => {
    lines.push(`  ${i + 1}. ${candidateLabel(candidate)}`);
    if (candidate.description) {
      lines.push(`     ${truncate(candidate.description, options.descriptionPreviewChars)}`);
    }
  });
  lines.push("  0. Cancel - don't add any book");
  return lines;
}

/**
 * Map the user's answer to a zero-based index into the displayed list.
 * Anything other than a number in `1..shownCount` aborts the invocation.
 */
export function parseSelection(answer: string, shownCount: number): number {
  const trimmed = answer.trim().toLowerCase();

  if (trimmed === "" || CANCEL_WORDS.has(trimmed)) {
    throw new SelectionAbortedError("No book selected", answer);
  }

  if (!/^\d+$/.test(trimmed)) {
    throw new SelectionAbortedError(
      `Invalid selection "${answer.trim()}": expected a number between 1 and ${shownCount}`,
      answer,
    );
  }

  const n = Number(trimmed);
  if (n < 1 || n > shownCount) {
    throw new SelectionAbortedError(
      `Selection ${n} is out of range: expected a number between 1 and ${shownCount}`,
      answer,
    );
  }
  return n - 1;
}

/**
 * Return exactly one candidate. A single candidate is returned without
 * prompting; longer lists are truncated, shown and asked about once.
 */
export async function selectCandidate(
  candidates: readonly BookCandidate[],
  prompter: Prompter,
  output: Output,
  options: AmbiguityOptions,
): Promise<BookCandidate> {
  if (candidates.length === 0) {
    throw new SelectionAbortedError("No candidates to choose from", "");
  }
  if (candidates.length === 1) return candidates[0];

  const shown = candidates.slice(0, Math.max(1, options.maxResults));
  const sourceName = candidates[0].sourceName;

  output.write(
    `Found ${candidates.length} books from ${sourceName} (showing top ${shown.length}):`,
  );
  for (const line of renderCandidateList(shown, options)) output.write(line);

  const answer = await prompter.ask(`Select a book [1-${shown.length}, 0 to cancel]: `);
  return shown[parseSelection(answer, shown.length)];
}
