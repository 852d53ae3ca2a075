// ---------------------------------------------------------------------------
// `shelfwright test-connection`: read one row from each configured table.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type { AppConfig, Output } from "../../core/types.js";
import { ConfigurationError } from "../../core/errors.js";
import { BaserowClient } from "../../baserow/baserow-client.js";
import { isPlaceholderSecret } from "../../llm/create-backend.js";

export type ConnectionStore = Pick<BaserowClient, "testConnection">;

export async function runTestConnection(
  config: AppConfig,
  output: Output,
  logger: Logger,
  store: ConnectionStore = new BaserowClient({
    baseUrl: config.baserow.baseUrl,
    apiToken: config.baserow.apiToken,
    timeoutMs: config.requestTimeoutMs,
    logger,
  }),
): Promise<void> {
  if (isPlaceholderSecret(config.baserow.apiToken)) {
    throw new ConfigurationError("Baserow API token not configured");
  }

  const tables: Array<[string, number]> = [
    ["categories", config.baserow.categoriesTableId],
    ["media", config.baserow.mediaTableId],
  ];

  output.write(`Testing Baserow connection to ${config.baserow.baseUrl}...`);
  for (const [label, tableId] of tables) {
    if (tableId === 0) {
      throw new ConfigurationError(`Baserow ${label} table id not configured`);
    }
    await store.testConnection(tableId);
    output.write(`  ${label} table ${tableId}: ok`);
  }
  output.write("Baserow connection successful!");
}
