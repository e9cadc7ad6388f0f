// src/services/consistency-engine.ts
/**
 * Consistency Engine
 *
 * Cross-table operations over Children, Pets and Owners. The store has no
 * transactions: each store call is applied as soon as it runs, and when a
 * later call fails the earlier ones stay applied. Failures are returned as
 * typed results naming the failed step and the steps already done, so an
 * operator can reconcile by hand.
 *
 * Dangling references (an Owners row naming a deleted child or pet) come
 * back as "inconsistent" results and are logged as warnings.
 */

import type { RowStore } from "../lib/row-store/index.js";
import { SerialQueue } from "../lib/serial-queue.js";
import {
  childFullName,
  type Child,
  type ChildInput,
  type LocatedLink,
  type Pet,
  type PetInput,
} from "../types/records.js";
import {
  createChild,
  deleteChildById,
  findChildByFullName,
  findChildById,
  listChildren as readAllChildren,
} from "./child-repository.js";
import type { ServiceContext } from "./context.js";
import {
  clearPetLink,
  findLinkByChildName,
  findLinkByPetId,
  listLinks as readAllLinks,
  removeChildLink,
  upsertLink,
  type UpsertLinkResult,
} from "./link-registry.js";
import {
  createPet,
  deletePetById,
  findPetById,
  listPets as readAllPets,
} from "./pet-repository.js";
import { StepFailure, StepTracker, type StepFailureDetail } from "./steps.js";

/* ─────────────────────────────────────────────────────────────────────────────
 * Types
 * ───────────────────────────────────────────────────────────────────────────── */

export interface NotFoundFailure {
  code: "not_found";
  entity: "child" | "pet";
  id: number;
}

export interface ExistingChildLinkConflict {
  code: "conflict_existing_child_link";
  childName: string;
  currentPetId: number;
  requestedPetId: number;
}

export interface PetAlreadyLinkedConflict {
  code: "conflict_pet_already_linked";
  petId: number;
  ownerName: string;
}

export type EngineFailure =
  | NotFoundFailure
  | ExistingChildLinkConflict
  | PetAlreadyLinkedConflict
  | StepFailureDetail;

export type EngineFailureCode = EngineFailure["code"];

export type EngineFailureResult = { ok: false; error: EngineFailure };

export type EngineResult<T> = ({ ok: true } & T) | EngineFailureResult;

/** Explicit permission to resolve the two link conflicts */
export interface LinkOverrides {
  /** Replace the pet the child is already linked to */
  replaceChildLink?: boolean;
  /** Take the pet away from the child currently holding it */
  reassignPet?: boolean;
}

export type LinkOutcome = {
  child: Child;
  pet: Pet;
} & Omit<UpsertLinkResult, "rowIndex">;

export type PetByChildSearch =
  | { status: "unlinked"; child: Child }
  | { status: "inconsistent"; child: Child; danglingPetId: number }
  | { status: "found"; child: Child; pet: Pet };

export type ChildByPetSearch =
  | { status: "unlinked"; pet: Pet }
  | { status: "inconsistent"; pet: Pet; danglingChildName: string }
  | { status: "found"; pet: Pet; child: Child };

/* ─────────────────────────────────────────────────────────────────────────────
 * Helpers
 * ───────────────────────────────────────────────────────────────────────────── */

function fail(error: EngineFailure): EngineFailureResult {
  return { ok: false, error };
}

function notFound(entity: NotFoundFailure["entity"], id: number): EngineFailureResult {
  return fail({ code: "not_found", entity, id });
}

// Operations read, decide, then write; two interleaved on one store would act on stale reads
const operationQueues = new WeakMap<RowStore, SerialQueue>();

function operationQueue(store: RowStore): SerialQueue {
  let queue = operationQueues.get(store);
  if (!queue) {
    queue = new SerialQueue();
    operationQueues.set(store, queue);
  }
  return queue;
}

/**
 * Runs one engine operation with a fresh step tracker, after every earlier
 * operation on the same store has finished. Store failures become a
 * step_failed result; anything else is a fault and propagates.
 */
async function runOperation<T>(
  ctx: ServiceContext,
  operation: string,
  fn: (steps: StepTracker) => Promise<EngineResult<T>>
): Promise<EngineResult<T>> {
  return operationQueue(ctx.store).run(() => runSteps(ctx, operation, fn));
}

async function runSteps<T>(
  ctx: ServiceContext,
  operation: string,
  fn: (steps: StepTracker) => Promise<EngineResult<T>>
): Promise<EngineResult<T>> {
  const steps = new StepTracker();
  try {
    return await fn(steps);
  } catch (err) {
    if (err instanceof StepFailure) {
      ctx.log.error(
        {
          operation,
          step: err.step,
          completedSteps: err.completedSteps,
          appliedWrites: err.appliedWrites,
          storeError: err.storeError.code,
          table: err.storeError.table,
        },
        "Operation aborted; completed steps were not rolled back"
      );
      return fail(err.toDetail());
    }
    throw err;
  }
}

/* ─────────────────────────────────────────────────────────────────────────────
 * Records
 * ───────────────────────────────────────────────────────────────────────────── */

export async function addChild(ctx: ServiceContext, input: ChildInput): Promise<EngineResult<{ child: Child }>> {
  return runOperation<{ child: Child }>(ctx, "add_child", async (steps) => {
    const child = await createChild(ctx, input, steps);
    ctx.log.info({ childId: child.id }, "Child added");
    return { ok: true, child };
  });
}

export async function addPet(ctx: ServiceContext, input: PetInput): Promise<EngineResult<{ pet: Pet }>> {
  return runOperation<{ pet: Pet }>(ctx, "add_pet", async (steps) => {
    const pet = await createPet(ctx, input, steps);
    ctx.log.info({ petId: pet.id }, "Pet added");
    return { ok: true, pet };
  });
}

export async function getChild(ctx: ServiceContext, childId: number): Promise<EngineResult<{ child: Child }>> {
  return runOperation<{ child: Child }>(ctx, "get_child", async (steps) => {
    const child = await steps.run("resolve_child", () => findChildById(ctx, childId));
    if (!child) return notFound("child", childId);
    return { ok: true, child };
  });
}

export async function getPet(ctx: ServiceContext, petId: number): Promise<EngineResult<{ pet: Pet }>> {
  return runOperation<{ pet: Pet }>(ctx, "get_pet", async (steps) => {
    const pet = await steps.run("resolve_pet", () => findPetById(ctx, petId));
    if (!pet) return notFound("pet", petId);
    return { ok: true, pet };
  });
}

export async function listChildren(ctx: ServiceContext): Promise<EngineResult<{ children: Child[] }>> {
  return runOperation<{ children: Child[] }>(ctx, "list_children", async (steps) => {
    const children = await steps.run("list_records", () => readAllChildren(ctx));
    return { ok: true, children };
  });
}

export async function listPets(ctx: ServiceContext): Promise<EngineResult<{ pets: Pet[] }>> {
  return runOperation<{ pets: Pet[] }>(ctx, "list_pets", async (steps) => {
    const pets = await steps.run("list_records", () => readAllPets(ctx));
    return { ok: true, pets };
  });
}

export async function listLinks(ctx: ServiceContext): Promise<EngineResult<{ links: LocatedLink[] }>> {
  return runOperation<{ links: LocatedLink[] }>(ctx, "list_links", async (steps) => {
    const links = await steps.run("list_records", () => readAllLinks(ctx));
    return { ok: true, links };
  });
}

/* ─────────────────────────────────────────────────────────────────────────────
 * Linking
 * ───────────────────────────────────────────────────────────────────────────── */

/**
 * Links a child to a pet.
 *
 * Two conflicts need explicit overrides, checked child first: the child
 * already holds a different pet, and the pet is held by another child.
 * Linking a pair that is already linked succeeds without writing.
 */
export async function linkChildAndPet(
  ctx: ServiceContext,
  childId: number,
  petId: number,
  overrides: LinkOverrides = {}
): Promise<EngineResult<LinkOutcome>> {
  return runOperation<LinkOutcome>(ctx, "link_child_and_pet", async (steps) => {
    const child = await steps.run("resolve_child", () => findChildById(ctx, childId));
    if (!child) return notFound("child", childId);

    const pet = await steps.run("resolve_pet", () => findPetById(ctx, petId));
    if (!pet) return notFound("pet", petId);

    const childName = childFullName(child);

    const childLink = await steps.run("lookup_child_link", () => findLinkByChildName(ctx, childName));
    const currentPetId = childLink?.link.petId ?? null;
    if (currentPetId !== null && currentPetId !== pet.id && !overrides.replaceChildLink) {
      ctx.log.warn({ childName, currentPetId, requestedPetId: pet.id }, "Child already linked to another pet");
      return fail({
        code: "conflict_existing_child_link",
        childName,
        currentPetId,
        requestedPetId: pet.id,
      });
    }

    const petLink = await steps.run("lookup_pet_link", () => findLinkByPetId(ctx, pet.id));
    if (petLink && petLink.link.childName !== childName && !overrides.reassignPet) {
      ctx.log.warn({ petId: pet.id, ownerName: petLink.link.childName }, "Pet already linked to another child");
      return fail({
        code: "conflict_pet_already_linked",
        petId: pet.id,
        ownerName: petLink.link.childName,
      });
    }

    const { action, previousPetId, clearedFrom } = await upsertLink(ctx, childName, pet.id, steps);
    ctx.log.info({ childId: child.id, petId: pet.id, action }, "Child and pet linked");
    return { ok: true, child, pet, action, previousPetId, clearedFrom };
  });
}

/* ─────────────────────────────────────────────────────────────────────────────
 * Search
 * ───────────────────────────────────────────────────────────────────────────── */

export async function searchPetByChild(
  ctx: ServiceContext,
  childId: number
): Promise<EngineResult<PetByChildSearch>> {
  return runOperation<PetByChildSearch>(ctx, "search_pet_by_child", async (steps) => {
    const child = await steps.run("resolve_child", () => findChildById(ctx, childId));
    if (!child) return notFound("child", childId);

    const childName = childFullName(child);
    const located = await steps.run("lookup_child_link", () => findLinkByChildName(ctx, childName));
    const danglingPetId = located?.link.petId ?? null;
    if (danglingPetId === null) {
      return { ok: true, status: "unlinked", child };
    }

    const pet = await steps.run("resolve_linked_pet", () => findPetById(ctx, danglingPetId));
    if (!pet) {
      ctx.log.warn({ childName, petId: danglingPetId }, "Owners row points at a pet that does not exist");
      return { ok: true, status: "inconsistent", child, danglingPetId };
    }
    return { ok: true, status: "found", child, pet };
  });
}

export async function searchChildByPet(
  ctx: ServiceContext,
  petId: number
): Promise<EngineResult<ChildByPetSearch>> {
  return runOperation<ChildByPetSearch>(ctx, "search_child_by_pet", async (steps) => {
    const pet = await steps.run("resolve_pet", () => findPetById(ctx, petId));
    if (!pet) return notFound("pet", petId);

    const located = await steps.run("lookup_pet_link", () => findLinkByPetId(ctx, pet.id));
    if (!located) {
      return { ok: true, status: "unlinked", pet };
    }

    const danglingChildName = located.link.childName;
    const child = await steps.run("resolve_linked_child", () => findChildByFullName(ctx, danglingChildName));
    if (!child) {
      ctx.log.warn({ petId: pet.id, childName: danglingChildName }, "Owners row names a child that does not exist");
      return { ok: true, status: "inconsistent", pet, danglingChildName };
    }
    return { ok: true, status: "found", pet, child };
  });
}

/* ─────────────────────────────────────────────────────────────────────────────
 * Deletes
 * ───────────────────────────────────────────────────────────────────────────── */

/** Deletes the child, then its whole Owners row (cascade-delete). */
export async function deleteChild(
  ctx: ServiceContext,
  childId: number
): Promise<EngineResult<{ child: Child; linkRemoved: boolean }>> {
  return runOperation<{ child: Child; linkRemoved: boolean }>(ctx, "delete_child", async (steps) => {
    const child = await steps.run("resolve_child", () => findChildById(ctx, childId));
    if (!child) return notFound("child", childId);

    const deleted = await steps.run("delete_child_record", () => deleteChildById(ctx, child.id));
    if (!deleted) return notFound("child", childId);

    const childName = childFullName(child);
    const { removedRows } = await steps.run("remove_child_link", () => removeChildLink(ctx, childName, steps));
    ctx.log.info({ childId: child.id, linkRemoved: removedRows.length > 0 }, "Child deleted");
    return { ok: true, child, linkRemoved: removedRows.length > 0 };
  });
}

/** Deletes the pet, then blanks its pet id in Owners (orphan-clear). */
export async function deletePet(
  ctx: ServiceContext,
  petId: number
): Promise<EngineResult<{ pet: Pet; linkCleared: boolean; formerOwner: string | null }>> {
  return runOperation<{ pet: Pet; linkCleared: boolean; formerOwner: string | null }>(ctx, "delete_pet", async (steps) => {
    const pet = await steps.run("resolve_pet", () => findPetById(ctx, petId));
    if (!pet) return notFound("pet", petId);

    const deleted = await steps.run("delete_pet_record", () => deletePetById(ctx, pet.id));
    if (!deleted) return notFound("pet", petId);

    const { cleared } = await steps.run("clear_pet_link", () => clearPetLink(ctx, pet.id, steps));
    const formerOwner = cleared[0]?.childName ?? null;
    ctx.log.info({ petId: pet.id, linkCleared: cleared.length > 0 }, "Pet deleted");
    return { ok: true, pet, linkCleared: cleared.length > 0, formerOwner };
  });
}
