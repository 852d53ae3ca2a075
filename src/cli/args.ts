// ---------------------------------------------------------------------------
// Command-line parsing. Pure: argv in, a command description out.
// ---------------------------------------------------------------------------

import { parseArgs } from "node:util";

import type { MediaClassification } from "../core/types.js";
import { UsageError } from "../core/errors.js";
import type { RawSearchInput } from "../domain/query/search-query.js";

export const USAGE = `Usage: shelfwright <command> [options]

Commands:
  add               Look up a book and add it to the Baserow media table
  test-connection   Check that the Baserow token and tables are reachable
  help              Show this message

Options for add:
  --isbn <isbn>       ISBN-10 or ISBN-13 (takes precedence over title/author)
  --title <title>     Book title (with --author)
  --author <author>   Book author (with --title)
  --ebook             Record the book as an ebook
  --physical          Record the book as a physical copy (default)
  --no-web            Skip web search enrichment

Common options:
  --config <path>     YAML config file (default: ./config.yaml)
  --verbose           Debug logging on stderr
  -h, --help          Show this message
  -v, --version       Print the version`;

interface CommonOptions {
  verbose: boolean;
  configPath?: string;
}

export type CliCommand =
  | { command: "help" }
  | { command: "version" }
  | ({
      command: "add";
      input: RawSearchInput;
      classification: MediaClassification;
      web: boolean;
    } & CommonOptions)
  | ({ command: "test-connection" } & CommonOptions);

const OPTIONS = {
  isbn: { type: "string" },
  title: { type: "string" },
  author: { type: "string" },
  ebook: { type: "boolean", default: false },
  physical: { type: "boolean", default: false },
  "no-web": { type: "boolean", default: false },
  config: { type: "string" },
  verbose: { type: "boolean", default: false },
  help: { type: "boolean", short: "h", default: false },
  version: { type: "boolean", short: "v", default: false },
} as const;

function parse(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error: unknown) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new UsageError(msg, { cause: error instanceof Error ? error : undefined });
  }
}

export function parseCommandLine(argv: readonly string[]): CliCommand {
  const { values, positionals } = parse(argv);

  if (values.help) return { command: "help" };
  if (values.version) return { command: "version" };

  const [command, ...extra] = positionals;
  if (command === undefined || command === "help") return { command: "help" };
  if (extra.length > 0) {
    throw new UsageError(`Unexpected argument "${extra[0]}"`);
  }

  const common: CommonOptions = { verbose: values.verbose };
  if (values.config !== undefined) common.configPath = values.config;

  switch (command) {
    case "add": {
      if (values.ebook && values.physical) {
        throw new UsageError("Use either --ebook or --physical, not both");
      }
      return {
        command: "add",
        input: { isbn: values.isbn, title: values.title, author: values.author },
        classification: values.ebook ? "ebook" : "physical",
        web: !values["no-web"],
        ...common,
      };
    }
    case "test-connection":
      return { command: "test-connection", ...common };
    default:
      throw new UsageError(`Unknown command "${command}"`);
  }
}
