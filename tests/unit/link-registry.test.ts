import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { MemoryRowStore } from "../../src/lib/row-store/index.js";
import {
  clearPetLink,
  findLinkByChildName,
  findLinkByPetId,
  listLinks,
  removeChildLink,
  upsertLink,
} from "../../src/services/link-registry.js";
import { StepFailure, StepTracker } from "../../src/services/steps.js";
import { createContext, dataRows, FaultyRowStore, memoryContext } from "../helpers/store-helpers.js";

describe("Link registry lookups", () => {
  it("finds a row by child name with its positional index", async () => {
    const { ctx } = memoryContext({ tables: { Owners: [["Amy Lee", "1"], ["Ben Ode", ""]] } });
    assert.deepEqual(await findLinkByChildName(ctx, "Ben Ode"), {
      rowIndex: 3,
      link: { childName: "Ben Ode", petId: null },
    });
    assert.equal(await findLinkByChildName(ctx, "Cal Poe"), null);
  });

  it("never matches blank pet id cells", async () => {
    const { ctx } = memoryContext({ tables: { Owners: [["Amy Lee", ""], ["Ben Ode", "4"]] } });
    assert.deepEqual(await findLinkByPetId(ctx, 4), {
      rowIndex: 3,
      link: { childName: "Ben Ode", petId: 4 },
    });
    assert.equal(await findLinkByPetId(ctx, 0), null);
  });

  it("treats an unreadable pet id as blank and skips rows without a name", async () => {
    const { ctx } = memoryContext({ tables: { Owners: [["", "3"], ["Amy Lee", "x1"]] } });
    assert.deepEqual(await listLinks(ctx), [{ rowIndex: 3, link: { childName: "Amy Lee", petId: null } }]);
  });
});

describe("upsertLink", () => {
  it("moves a pet to its new owner and blanks the old owner's cell", async () => {
    const { store, ctx } = memoryContext();

    await upsertLink(ctx, "A B", 7);
    const second = await upsertLink(ctx, "C D", 7);

    assert.deepEqual(second, {
      action: "created",
      rowIndex: 3,
      previousPetId: null,
      clearedFrom: [{ rowIndex: 2, childName: "A B" }],
    });
    assert.deepEqual(await dataRows(store, "Owners"), [
      ["A B", ""],
      ["C D", "7"],
    ]);
  });

  it("updates an existing row in place", async () => {
    const { store, ctx } = memoryContext({ tables: { Owners: [["A B", "3"]] } });

    const result = await upsertLink(ctx, "A B", 5);

    assert.deepEqual(result, { action: "updated", rowIndex: 2, previousPetId: 3, clearedFrom: [] });
    assert.deepEqual(await dataRows(store, "Owners"), [["A B", "5"]]);
  });

  it("reuses a row whose pet id is blank", async () => {
    const { store, ctx } = memoryContext({ tables: { Owners: [["A B", ""]] } });

    const result = await upsertLink(ctx, "A B", 2);

    assert.equal(result.action, "updated");
    assert.equal(result.previousPetId, null);
    assert.deepEqual(await dataRows(store, "Owners"), [["A B", "2"]]);
  });

  it("writes nothing when the link already exists", async () => {
    const store = new FaultyRowStore(new MemoryRowStore({ tables: { Owners: [["A B", "5"]] } }), []);

    const result = await upsertLink(createContext(store), "A B", 5);

    assert.equal(result.action, "unchanged");
    assert.deepEqual(store.writes, []);
  });

  it("clears the previous owner as its own write before assigning", async () => {
    const store = new FaultyRowStore(new MemoryRowStore({ tables: { Owners: [["A B", "7"], ["C D", "1"]] } }), []);

    await upsertLink(createContext(store), "C D", 7);

    assert.deepEqual(store.writes, [
      { method: "updateCell", table: "Owners", rowIndex: 2 },
      { method: "updateCell", table: "Owners", rowIndex: 3 },
    ]);
  });

  it("leaves the old owner cleared when the assignment fails", async () => {
    const inner = new MemoryRowStore({ tables: { Owners: [["A B", "7"], ["C D", "1"]] } });
    const store = new FaultyRowStore(inner, [
      { method: "updateCell", table: "Owners", code: "write_rejected", nth: 2 },
    ]);
    const steps = new StepTracker();

    await assert.rejects(upsertLink(createContext(store), "C D", 7, steps), (err: unknown) => {
      assert.ok(err instanceof StepFailure);
      assert.equal(err.step, "assign_pet");
      assert.deepEqual(err.completedSteps, ["read_links", "clear_previous_owner"]);
      return true;
    });
    assert.deepEqual(await dataRows(inner, "Owners"), [
      ["A B", ""],
      ["C D", "1"],
    ]);
  });
});

describe("clearPetLink", () => {
  it("blanks only the pet id cell", async () => {
    const { store, ctx } = memoryContext({ tables: { Owners: [["Amy Lee", "7"], ["Ben Ode", "8"]] } });

    const result = await clearPetLink(ctx, 7);

    assert.deepEqual(result, { cleared: [{ rowIndex: 2, childName: "Amy Lee" }] });
    assert.deepEqual(await dataRows(store, "Owners"), [
      ["Amy Lee", ""],
      ["Ben Ode", "8"],
    ]);
  });

  it("is a no-op when no row holds the pet", async () => {
    const { store, ctx } = memoryContext({ tables: { Owners: [["Amy Lee", "7"]] } });
    assert.deepEqual(await clearPetLink(ctx, 3), { cleared: [] });
    assert.deepEqual(await dataRows(store, "Owners"), [["Amy Lee", "7"]]);
  });
});

describe("removeChildLink", () => {
  it("deletes the child's whole row", async () => {
    const { store, ctx } = memoryContext({ tables: { Owners: [["Amy Lee", "7"], ["Ben Ode", "8"]] } });

    assert.deepEqual(await removeChildLink(ctx, "Amy Lee"), { removedRows: [2] });
    assert.deepEqual(await dataRows(store, "Owners"), [["Ben Ode", "8"]]);
  });

  it("removes duplicate rows bottom-up", async () => {
    const { store, ctx } = memoryContext({
      tables: { Owners: [["Amy Lee", "7"], ["Ben Ode", "8"], ["Amy Lee", ""]] },
    });

    assert.deepEqual(await removeChildLink(ctx, "Amy Lee"), { removedRows: [4, 2] });
    assert.deepEqual(await dataRows(store, "Owners"), [["Ben Ode", "8"]]);
  });

  it("is a no-op when the child has no row", async () => {
    const { ctx } = memoryContext();
    assert.deepEqual(await removeChildLink(ctx, "Amy Lee"), { removedRows: [] });
  });
});
