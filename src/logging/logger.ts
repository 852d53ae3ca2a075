// ---------------------------------------------------------------------------
// Pino structured logger factory. Logs go to stderr; stdout belongs to the
// interactive dialogue.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";
import { VERSION } from "../version.js";

export type Logger = pino.Logger;

/** Paths that should be redacted from log output to avoid leaking secrets. */
const SECRET_PATHS: string[] = [
  "*.apiKey",
  "*.apiToken",
  "*.token",
  "*.authorization",
  "headers.authorization",
  "config.baserow.apiToken",
  "config.llm.openai.apiKey",
  "config.llm.anthropic.apiKey",
  "config.googleBooks.apiKey",
];

/**
 * Create a configured pino logger.
 *
 * - JSON to fd 2, or `pino-pretty` (also to fd 2) when `prettyPrint` is set
 * - Secret redaction on sensitive key paths
 * - Base fields: `service` and `version`
 */
export function createLogger(config: LoggingConfig): pino.Logger {
  const baseOptions: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: "shelfwright",
      version: VERSION,
    },
    ...(config.redactSecrets
      ? {
          redact: {
            paths: SECRET_PATHS,
            censor: "[REDACTED]",
          },
        }
      : {}),
  };

  if (config.prettyPrint) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          destination: 2,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname,service,version",
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(2));
}
