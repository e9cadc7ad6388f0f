// src/services/identity-allocator.ts

import type { TableName } from "../lib/row-store/index.js";
import { parseIntCell, type ServiceContext } from "./context.js";

export type AllocatedTable = Extract<TableName, "Children" | "Pets">;

/**
 * Next id for a table: highest existing id + 1, or 1 when there is none.
 * Gaps left by deleted rows are never filled. Rows without a parseable id
 * are skipped.
 */
export async function nextId(ctx: ServiceContext, table: AllocatedTable): Promise<number> {
  const rows = await ctx.store.readAllRows(table);

  let maxId = 0;
  rows.slice(1).forEach((row, i) => {
    const id = parseIntCell(row[0]);
    if (id === null) {
      ctx.log.info({ table, rowIndex: i + 2, cell: row[0] ?? null }, "malformed_row: skipping row without a valid id");
      return;
    }
    maxId = Math.max(maxId, id);
  });

  return maxId + 1;
}
