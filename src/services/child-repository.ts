// src/services/child-repository.ts
// Children table <-> Child records

import { childFullName, type Child, type ChildInput } from "../types/records.js";
import { parseIntCell, type ServiceContext } from "./context.js";
import { nextId } from "./identity-allocator.js";
import { StepTracker } from "./steps.js";

const TABLE = "Children" as const;

/* ─────────────────────────────────────────────────────────────────────────────
 * Row mapping
 * ───────────────────────────────────────────────────────────────────────────── */

export function childToRow(child: Child): string[] {
  return [String(child.id), child.firstName, child.lastName, String(child.ageYears)];
}

/** Returns null for rows missing a required cell */
export function rowToChild(row: string[]): Child | null {
  const id = parseIntCell(row[0]);
  const firstName = row[1] ?? "";
  const lastName = row[2] ?? "";
  const ageYears = parseIntCell(row[3]);
  if (id === null || !firstName.trim() || !lastName.trim() || ageYears === null) {
    return null;
  }
  return { id, firstName, lastName, ageYears };
}

async function readChildren(ctx: ServiceContext): Promise<Child[]> {
  const rows = await ctx.store.readAllRows(TABLE);
  const children: Child[] = [];
  rows.slice(1).forEach((row, i) => {
    const child = rowToChild(row);
    if (!child) {
      ctx.log.info({ table: TABLE, rowIndex: i + 2 }, "malformed_row: skipping child row");
      return;
    }
    children.push(child);
  });
  return children;
}

/* ─────────────────────────────────────────────────────────────────────────────
 * Operations
 * ───────────────────────────────────────────────────────────────────────────── */

export async function createChild(
  ctx: ServiceContext,
  input: ChildInput,
  steps: StepTracker = new StepTracker()
): Promise<Child> {
  const id = await steps.run("allocate_id", () => nextId(ctx, TABLE));
  const child: Child = { id, ...input };
  await steps.run("append_record", () => ctx.store.appendRow(TABLE, childToRow(child)));
  return child;
}

export async function listChildren(ctx: ServiceContext): Promise<Child[]> {
  return readChildren(ctx);
}

export async function findChildById(ctx: ServiceContext, id: number): Promise<Child | null> {
  const children = await readChildren(ctx);
  return children.find((c) => c.id === id) ?? null;
}

/**
 * First child whose "First Last" equals fullName. Names are not unique;
 * with duplicates the earliest row wins.
 */
export async function findChildByFullName(ctx: ServiceContext, fullName: string): Promise<Child | null> {
  const children = await readChildren(ctx);
  return children.find((c) => childFullName(c) === fullName) ?? null;
}

/**
 * Deletes the row holding this id. The row index is located on a fresh read
 * right before the delete, so rows shifted by earlier deletes are honoured.
 */
export async function deleteChildById(ctx: ServiceContext, id: number): Promise<boolean> {
  const rows = await ctx.store.readAllRows(TABLE);
  const position = rows.findIndex((row, i) => i > 0 && parseIntCell(row[0]) === id);
  if (position === -1) return false;

  await ctx.store.deleteRow(TABLE, position + 1);
  return true;
}
