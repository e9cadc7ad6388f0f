// src/lib/logger.ts
import pino from "pino";
import type { AppConfig } from "../config/env.js";

export function createLogger(config: Pick<AppConfig, "LOG_LEVEL">) {
  return pino({ level: config.LOG_LEVEL });
}
