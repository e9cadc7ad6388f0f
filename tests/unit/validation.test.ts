import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  capitalize,
  childCreateSchema,
  idParamSchema,
  linkCreateSchema,
  petCreateSchema,
} from "../../src/validation/schemas.js";

describe("capitalize", () => {
  it("upper-cases the first letter and lower-cases the rest", () => {
    assert.equal(capitalize("mcKAY"), "Mckay");
    assert.equal(capitalize("a"), "A");
    assert.equal(capitalize(""), "");
  });
});

describe("childCreateSchema", () => {
  it("trims and capitalizes names and reads digit strings", () => {
    const parsed = childCreateSchema.safeParse({ firstName: "  amy ", lastName: "LEE", ageYears: "10" });
    assert.ok(parsed.success);
    assert.deepEqual(parsed.data, { firstName: "Amy", lastName: "Lee", ageYears: 10 });
  });

  it("rejects blank names", () => {
    const parsed = childCreateSchema.safeParse({ firstName: "   ", lastName: "Lee", ageYears: 10 });
    assert.ok(!parsed.success);
    assert.deepEqual(parsed.error.flatten().fieldErrors.firstName, ["firstName cannot be empty"]);
  });

  it("accepts the age bounds and rejects values outside them", () => {
    assert.ok(childCreateSchema.safeParse({ firstName: "A", lastName: "B", ageYears: 5 }).success);
    assert.ok(childCreateSchema.safeParse({ firstName: "A", lastName: "B", ageYears: 18 }).success);

    const young = childCreateSchema.safeParse({ firstName: "A", lastName: "B", ageYears: 4 });
    assert.ok(!young.success);
    assert.deepEqual(young.error.flatten().fieldErrors.ageYears, ["ageYears must be between 5 and 18"]);

    assert.equal(childCreateSchema.safeParse({ firstName: "A", lastName: "B", ageYears: 19 }).success, false);
  });

  it("rejects fractional and non-numeric ages", () => {
    const fractional = childCreateSchema.safeParse({ firstName: "A", lastName: "B", ageYears: 10.5 });
    assert.ok(!fractional.success);
    assert.deepEqual(fractional.error.flatten().fieldErrors.ageYears, ["ageYears must be a whole number"]);

    const words = childCreateSchema.safeParse({ firstName: "A", lastName: "B", ageYears: "ten" });
    assert.ok(!words.success);
    assert.ok(words.error.flatten().fieldErrors.ageYears);
  });
});

describe("petCreateSchema", () => {
  it("maps species shortcuts case-insensitively", () => {
    const parsed = petCreateSchema.safeParse({ nickname: "rex", ageMonths: 0, species: " K " });
    assert.ok(parsed.success);
    assert.deepEqual(parsed.data, { nickname: "Rex", ageMonths: 0, species: "kitty" });

    const puppy = petCreateSchema.safeParse({ nickname: "Tom", ageMonths: 12, species: "Puppy" });
    assert.ok(puppy.success);
    assert.equal(puppy.data.species, "puppy");
  });

  it("rejects other species", () => {
    const parsed = petCreateSchema.safeParse({ nickname: "Rex", ageMonths: 3, species: "dog" });
    assert.ok(!parsed.success);
    assert.deepEqual(parsed.error.flatten().fieldErrors.species, [
      "species must be 'puppy' or 'kitty' (or 'p' / 'k')",
    ]);
  });

  it("rejects names inherited from Object.prototype", () => {
    for (const species of ["constructor", "toString", "__proto__", "hasOwnProperty"]) {
      const parsed = petCreateSchema.safeParse({ nickname: "Rex", ageMonths: 3, species });
      assert.ok(!parsed.success, species);
      assert.deepEqual(parsed.error.flatten().fieldErrors.species, [
        "species must be 'puppy' or 'kitty' (or 'p' / 'k')",
      ]);
    }
  });

  it("limits age to 0..12 months", () => {
    const parsed = petCreateSchema.safeParse({ nickname: "Rex", ageMonths: 13, species: "p" });
    assert.ok(!parsed.success);
    assert.deepEqual(parsed.error.flatten().fieldErrors.ageMonths, ["ageMonths must be between 0 and 12"]);
  });
});

describe("linkCreateSchema", () => {
  it("reads ids and optional override flags", () => {
    const parsed = linkCreateSchema.safeParse({ childId: "3", petId: 2, override: true });
    assert.ok(parsed.success);
    assert.deepEqual(parsed.data, { childId: 3, petId: 2, override: true });
  });

  it("rejects ids below 1", () => {
    const parsed = linkCreateSchema.safeParse({ childId: 0, petId: 2 });
    assert.ok(!parsed.success);
    assert.deepEqual(parsed.error.flatten().fieldErrors.childId, ["childId must be a positive integer"]);
  });

  it("rejects ids beyond the safe integer range", () => {
    const parsed = linkCreateSchema.safeParse({ childId: "9007199254740993", petId: 1 });
    assert.ok(!parsed.success);
    assert.deepEqual(parsed.error.flatten().fieldErrors.childId, ["childId is too large"]);
  });

  it("requires boolean overrides", () => {
    assert.equal(linkCreateSchema.safeParse({ childId: 1, petId: 1, reassignPet: "yes" }).success, false);
  });
});

describe("idParamSchema", () => {
  it("parses path ids", () => {
    const parsed = idParamSchema.safeParse({ id: "12" });
    assert.ok(parsed.success);
    assert.equal(parsed.data.id, 12);
    assert.equal(idParamSchema.safeParse({ id: "abc" }).success, false);
  });
});
