// src/server.ts
import { buildApp } from "./app.js";
import { loadConfig } from "./config/env.js";
import { createLogger } from "./lib/logger.js";
import { createRowStore } from "./lib/row-store/index.js";

// ---------- Env ----------
const config = loadConfig();
const logger = createLogger(config);

// ---------- App ----------
const store = await createRowStore(config, logger);
const app = await buildApp({
  store,
  logger,
  allowedOrigins: config.ALLOWED_ORIGINS,
});

// ---------- Start ----------
export async function start() {
  try {
    await app.ready();
    await app.listen({ port: config.PORT, host: config.HOST });
    app.log.info({ rowStore: config.ROW_STORE, dataDir: config.DATA_DIR }, `API listening on :${config.PORT}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

await start();

// ---------- Shutdown ----------
async function shutdown(signal: string) {
  app.log.info(`${signal} received, closing`);
  await app.close();
  process.exit(0);
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
