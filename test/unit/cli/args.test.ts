import { describe, it, expect } from "vitest";

import { parseCommandLine } from "../../../src/cli/args.js";
import { UsageError } from "../../../src/core/errors.js";

describe("parseCommandLine", () => {
  it("parses an add by ISBN with defaults", () => {
    expect(parseCommandLine(["add", "--isbn", "9780345391803"])).toEqual({
      command: "add",
      input: { isbn: "9780345391803" },
      classification: "physical",
      web: true,
      verbose: false,
    });
  });

  it("parses an ebook add by title and author with every flag", () => {
    expect(
      parseCommandLine([
        "add",
        "--title",
        "Dune",
        "--author",
        "Frank Herbert",
        "--ebook",
        "--no-web",
        "--verbose",
        "--config",
        "alt.yaml",
      ]),
    ).toEqual({
      command: "add",
      input: { title: "Dune", author: "Frank Herbert" },
      classification: "ebook",
      web: false,
      verbose: true,
      configPath: "alt.yaml",
    });
  });

  it("parses test-connection", () => {
    expect(parseCommandLine(["test-connection", "--config", "c.yaml"])).toEqual({
      command: "test-connection",
      verbose: false,
      configPath: "c.yaml",
    });
  });

  it("falls back to help without a command", () => {
    expect(parseCommandLine([])).toEqual({ command: "help" });
    expect(parseCommandLine(["help"])).toEqual({ command: "help" });
    expect(parseCommandLine(["add", "-h"])).toEqual({ command: "help" });
  });

  it("recognises the version flag", () => {
    expect(parseCommandLine(["-v"])).toEqual({ command: "version" });
    expect(parseCommandLine(["--version"])).toEqual({ command: "version" });
  });

  it("rejects conflicting media types", () => {
    expect(() => parseCommandLine(["add", "--isbn", "1", "--ebook", "--physical"])).toThrow(
      new UsageError("Use either --ebook or --physical, not both"),
    );
  });

  it("rejects unknown commands and stray arguments", () => {
    expect(() => parseCommandLine(["remove"])).toThrow('Unknown command "remove"');
    expect(() => parseCommandLine(["add", "extra"])).toThrow('Unexpected argument "extra"');
  });

  it("turns unknown options into a UsageError", () => {
    expect(() => parseCommandLine(["add", "--colour"])).toThrow(UsageError);
  });
});
