// src/services/context.ts

import type { FastifyBaseLogger } from "fastify";
import type { RowStore } from "../lib/row-store/index.js";

/** Everything a repository, the link registry or the engine needs for one call */
export interface ServiceContext {
  store: RowStore;
  log: FastifyBaseLogger;
}

const INT_PATTERN = /^\d+$/;

/** Parses an id or age cell; digits only and within the safe integer range, anything else is malformed */
export function parseIntCell(cell: string | undefined): number | null {
  if (cell === undefined || !INT_PATTERN.test(cell)) return null;
  const value = Number(cell);
  return Number.isSafeInteger(value) ? value : null;
}
