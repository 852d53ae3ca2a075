#!/usr/bin/env node
// ---------------------------------------------------------------------------
// shelfwright entry point.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { AppConfig } from "../core/types.js";
import { loadConfig, loadEnvFile, validateForAdd } from "../config/config.js";
import { createLogger } from "../logging/logger.js";
import { VERSION } from "../version.js";
import { USAGE, parseCommandLine, type CliCommand } from "./args.js";
import { runAdd } from "./commands/add.js";
import { runTestConnection } from "./commands/test-connection.js";
import { ExitCode, describeFailure, exitCodeFor } from "./exit-codes.js";
import { ReadlinePrompter, StdoutOutput } from "./prompter.js";

function startLogger(config: AppConfig, verbose: boolean): Logger {
  return createLogger({
    level: verbose ? "debug" : config.logLevel,
    prettyPrint: process.stderr.isTTY === true,
    redactSecrets: true,
  });
}

async function dispatch(command: CliCommand): Promise<ExitCode> {
  const output = new StdoutOutput();

  switch (command.command) {
    case "help":
      output.write(USAGE);
      return ExitCode.OK;

    case "version":
      output.write(VERSION);
      return ExitCode.OK;

    case "test-connection": {
      loadEnvFile();
      const config = loadConfig({ configPath: command.configPath });
      await runTestConnection(config, output, startLogger(config, command.verbose));
      return ExitCode.OK;
    }

    case "add": {
      loadEnvFile();
      const config = loadConfig({ configPath: command.configPath });
      validateForAdd(config);
      const logger = startLogger(config, command.verbose);
      const prompter = new ReadlinePrompter();
      try {
        await runAdd(command, config, { prompter, output }, logger);
      } finally {
        prompter.close();
      }
      return ExitCode.OK;
    }
  }
}

export async function main(argv: readonly string[]): Promise<ExitCode> {
  try {
    return await dispatch(parseCommandLine(argv));
  } catch (error: unknown) {
    const code = exitCodeFor(error);
    process.stderr.write(`${describeFailure(error)}\n`);
    if (code === ExitCode.USAGE) process.stderr.write("Run `shelfwright help` for usage.\n");
    return code;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`${describeFailure(error)}\n`);
    process.exitCode = ExitCode.FAILURE;
  },
);
