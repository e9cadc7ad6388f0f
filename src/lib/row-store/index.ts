// src/lib/row-store/index.ts

import type { FastifyBaseLogger } from "fastify";
import type { AppConfig } from "../../config/env.js";
import { CsvFileRowStore } from "./csv-file-store.js";
import { MemoryRowStore } from "./memory-store.js";
import type { RowStore } from "./types.js";

export * from "./types.js";
export { MemoryRowStore, type MemoryRowStoreOptions } from "./memory-store.js";
export { CsvFileRowStore } from "./csv-file-store.js";

/**
 * Builds the row store selected by ROW_STORE. The CSV backend gets a
 * header-only file for every table that does not exist yet.
 */
export async function createRowStore(config: AppConfig, log: FastifyBaseLogger): Promise<RowStore> {
  if (config.ROW_STORE === "memory") {
    log.warn("Using in-memory row store; data is lost on restart");
    return new MemoryRowStore();
  }

  const store = new CsvFileRowStore(config.DATA_DIR);
  const created = await store.ensureTables();
  if (created.length > 0) {
    log.info({ dataDir: config.DATA_DIR, created }, "Created missing tables");
  }
  return store;
}
