// src/services/link-registry.ts
/**
 * Link Registry
 *
 * The Owners table maps a child's full name to at most one pet id. A row with
 * a blank pet id is a child known to the registry but currently unlinked.
 *
 * Every call scans the table fresh; nothing is cached between calls because
 * the table can be edited outside this process.
 *
 * Known limitation: rows are keyed by "First Last", so two children with the
 * same name share one row.
 */

import type { Link, LocatedLink } from "../types/records.js";
import { parseIntCell, type ServiceContext } from "./context.js";
import { StepTracker } from "./steps.js";

const TABLE = "Owners" as const;
const PET_ID_COLUMN = 2;

// ─── Types ──────────────────────────────────────────────────────────────────

export type UpsertAction = "created" | "updated" | "unchanged";

export interface UpsertLinkResult {
  action: UpsertAction;
  rowIndex: number;
  /** Pet id the child's row held before this call (null when blank or new) */
  previousPetId: number | null;
  /** Rows of other children whose pet id was blanked before the assignment */
  clearedFrom: Array<{ rowIndex: number; childName: string }>;
}

export interface ClearPetLinkResult {
  cleared: Array<{ rowIndex: number; childName: string }>;
}

export interface RemoveChildLinkResult {
  removedRows: number[];
}

// ─── Scanning ───────────────────────────────────────────────────────────────

function rowToLink(row: string[]): { link: Link; malformedPetId: boolean } | null {
  const childName = row[0] ?? "";
  if (!childName.trim()) return null;

  const petCell = (row[1] ?? "").trim();
  if (petCell === "") return { link: { childName, petId: null }, malformedPetId: false };

  const petId = parseIntCell(petCell);
  return { link: { childName, petId }, malformedPetId: petId === null };
}

async function scanOwners(ctx: ServiceContext): Promise<{ links: LocatedLink[]; rowCount: number }> {
  const rows = await ctx.store.readAllRows(TABLE);
  const links: LocatedLink[] = [];

  rows.forEach((row, i) => {
    if (i === 0) return; // header
    const rowIndex = i + 1;
    const decoded = rowToLink(row);
    if (!decoded) {
      ctx.log.info({ table: TABLE, rowIndex }, "malformed_row: skipping owners row without a child name");
      return;
    }
    if (decoded.malformedPetId) {
      ctx.log.info({ table: TABLE, rowIndex, cell: row[1] }, "malformed_row: unreadable pet id treated as blank");
    }
    links.push({ rowIndex, link: decoded.link });
  });

  return { links, rowCount: rows.length };
}

// ─── Lookups ────────────────────────────────────────────────────────────────

export async function listLinks(ctx: ServiceContext): Promise<LocatedLink[]> {
  const { links } = await scanOwners(ctx);
  return links;
}

export async function findLinkByChildName(ctx: ServiceContext, childName: string): Promise<LocatedLink | null> {
  const { links } = await scanOwners(ctx);
  return links.find((l) => l.link.childName === childName) ?? null;
}

/** Blank pet id cells never match */
export async function findLinkByPetId(ctx: ServiceContext, petId: number): Promise<LocatedLink | null> {
  const { links } = await scanOwners(ctx);
  return links.find((l) => l.link.petId === petId) ?? null;
}

// ─── Mutations ──────────────────────────────────────────────────────────────

/**
 * Points childName's row at petId, creating the row if needed.
 *
 * Any other row holding petId is blanked first, each as its own write, so a
 * failure part way leaves the old owner cleared and the new link not yet set
 * rather than a half-written row.
 */
export async function upsertLink(
  ctx: ServiceContext,
  childName: string,
  petId: number,
  steps: StepTracker = new StepTracker()
): Promise<UpsertLinkResult> {
  const { links, rowCount } = await steps.run("read_links", () => scanOwners(ctx));

  const own = links.find((l) => l.link.childName === childName) ?? null;
  const holders = links.filter((l) => l.link.petId === petId && l.link.childName !== childName);

  const clearedFrom: UpsertLinkResult["clearedFrom"] = [];
  for (const holder of holders) {
    await steps.run("clear_previous_owner", () =>
      ctx.store.updateCell(TABLE, holder.rowIndex, PET_ID_COLUMN, "")
    );
    steps.noteWrite({ step: "clear_previous_owner", table: TABLE, rowIndex: holder.rowIndex, change: "cleared_pet_id" });
    ctx.log.info(
      { petId, previousOwner: holder.link.childName, rowIndex: holder.rowIndex },
      "Cleared pet from previous owner"
    );
    clearedFrom.push({ rowIndex: holder.rowIndex, childName: holder.link.childName });
  }

  if (own) {
    const previousPetId = own.link.petId;
    if (previousPetId === petId) {
      return { action: "unchanged", rowIndex: own.rowIndex, previousPetId, clearedFrom };
    }
    await steps.run("assign_pet", () =>
      ctx.store.updateCell(TABLE, own.rowIndex, PET_ID_COLUMN, String(petId))
    );
    return { action: "updated", rowIndex: own.rowIndex, previousPetId, clearedFrom };
  }

  await steps.run("append_link", () => ctx.store.appendRow(TABLE, [childName, String(petId)]));
  return { action: "created", rowIndex: rowCount + 1, previousPetId: null, clearedFrom };
}

/**
 * Blanks the pet id wherever it is held; the child rows stay. Each cleared
 * row is noted on the tracker so a failure part way can name them.
 */
export async function clearPetLink(
  ctx: ServiceContext,
  petId: number,
  steps: StepTracker = new StepTracker()
): Promise<ClearPetLinkResult> {
  const { links } = await scanOwners(ctx);
  const holders = links.filter((l) => l.link.petId === petId);

  if (holders.length === 0) {
    ctx.log.info({ petId }, "No owners row holds this pet; nothing to clear");
    return { cleared: [] };
  }

  const cleared: ClearPetLinkResult["cleared"] = [];
  for (const holder of holders) {
    await ctx.store.updateCell(TABLE, holder.rowIndex, PET_ID_COLUMN, "");
    steps.noteWrite({ step: "clear_pet_link", table: TABLE, rowIndex: holder.rowIndex, change: "cleared_pet_id" });
    cleared.push({ rowIndex: holder.rowIndex, childName: holder.link.childName });
  }
  return { cleared };
}

/** Deletes the child's whole row. Duplicate rows are removed bottom-up so indices stay valid. */
export async function removeChildLink(
  ctx: ServiceContext,
  childName: string,
  steps: StepTracker = new StepTracker()
): Promise<RemoveChildLinkResult> {
  const { links } = await scanOwners(ctx);
  const rows = links
    .filter((l) => l.link.childName === childName)
    .map((l) => l.rowIndex)
    .sort((a, b) => b - a);

  if (rows.length === 0) {
    ctx.log.info({ childName }, "No owners row for this child; nothing to remove");
    return { removedRows: [] };
  }

  for (const rowIndex of rows) {
    await ctx.store.deleteRow(TABLE, rowIndex);
    steps.noteWrite({ step: "remove_child_link", table: TABLE, rowIndex, change: "deleted_row" });
  }
  return { removedRows: rows };
}
