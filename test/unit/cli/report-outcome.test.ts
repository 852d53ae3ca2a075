import { describe, it, expect } from "vitest";

import { reportOutcome } from "../../../src/cli/commands/add.js";
import { BaserowRequestError } from "../../../src/core/errors.js";
import type { MediaRecord } from "../../../src/core/types.js";
import { RecordingOutput } from "../../helpers/fakes.js";

const record: MediaRecord = {
  title: "Dune",
  authors: ["Frank Herbert"],
  isbn13: null,
  synopsis: "Spice.",
  synopsisOrigin: "source",
  categories: [],
  classification: "ebook",
  coverUrl: null,
};

describe("reportOutcome", () => {
  it("prints the cancellation message", () => {
    const output = new RecordingOutput();
    reportOutcome(
      { status: "cancelled", stage: "confirmation", message: "Cancelled; nothing was written" },
      output,
    );
    expect(output.lines).toEqual(["Cancelled; nothing was written"]);
  });

  it("reports the row and an attached cover", () => {
    const output = new RecordingOutput();
    reportOutcome(
      {
        status: "created",
        record,
        result: { rowId: 8, cover: { status: "attached", fileName: "dune.jpg" } },
      },
      output,
    );
    expect(output.lines).toEqual(['Added "Dune" as row 8.', "Cover attached: dune.jpg"]);
  });

  it("warns when the row exists but the cover failed", () => {
    const output = new RecordingOutput();
    reportOutcome(
      {
        status: "created",
        record,
        result: {
          rowId: 8,
          cover: { status: "failed", error: new BaserowRequestError("upload file via URL", 400, "") },
        },
      },
      output,
    );
    expect(output.lines[1]).toBe(
      "Warning: the row was created but the cover could not be attached " +
        "(Failed to upload file via URL: HTTP 400). Attach it by hand to row 8.",
    );
  });
});
