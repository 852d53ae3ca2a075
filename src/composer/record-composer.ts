// ---------------------------------------------------------------------------
// Record composer and the confirmation gate in front of the only write.
// ---------------------------------------------------------------------------

import type {
  BookCandidate,
  CategoryLabel,
  MediaClassification,
  MediaRecord,
  Output,
  Prompter,
} from "../core/types.js";
import { ConfirmationDeclinedError } from "../core/errors.js";
import { authorsLine, fullTitle } from "../domain/book/candidate.js";
import type { Synopsis } from "../orchestrator/synopsis-generator.js";

export const CONFIRM_QUESTION = "Add this book to Baserow? [y/N]: ";

const CLASSIFICATION_LABELS: Record<MediaClassification, string> = {
  ebook: "Ebook",
  physical: "Physical",
};

export function composeMediaRecord(
  candidate: BookCandidate,
  synopsis: Synopsis,
  categories: readonly CategoryLabel[],
  classification: MediaClassification,
): MediaRecord {
  return Object.freeze({
    title: fullTitle(candidate),
    authors: Object.freeze([...candidate.authors]),
    isbn13: candidate.identifiers.isbn13 ?? null,
    synopsis: synopsis.text,
    synopsisOrigin: synopsis.origin,
    categories: Object.freeze([...categories]),
    classification,
    coverUrl: candidate.coverUrl,
  });
}

export function renderRecordSummary(record: MediaRecord): string {
  return [
    "",
    "=== Record to add ===",
    `Title: ${record.title}`,
    `Author(s): ${authorsLine(record.authors)}`,
    `ISBN-13: ${record.isbn13 ?? "none"}`,
    `Media type: ${CLASSIFICATION_LABELS[record.classification]}`,
    `Categories: ${record.categories.map((c) => c.name).join(", ")}`,
    `Cover: ${record.coverUrl ?? "none"}`,
    `Synopsis (${record.synopsisOrigin === "source" ? "from source" : "generated"}):`,
    record.synopsis,
    "=====================",
  ].join("\n");
}

/** Only `y` or `yes`, in any case; everything else, blank included, is a no. */
export function isAffirmative(answer: string): boolean {
  const a = answer.trim().toLowerCase();
  return a === "y" || a === "yes";
}

/** Show the record and ask once; throws {@link ConfirmationDeclinedError} on anything but yes. */
export async function confirmRecord(
  record: MediaRecord,
  prompter: Prompter,
  output: Output,
): Promise<void> {
  output.write(renderRecordSummary(record));
  const answer = await prompter.ask(CONFIRM_QUESTION);
  if (!isAffirmative(answer)) throw new ConfirmationDeclinedError();
}
