// src/services/pet-repository.ts
// Pets table <-> Pet records

import { PET_SPECIES, type Pet, type PetInput, type PetSpecies } from "../types/records.js";
import { parseIntCell, type ServiceContext } from "./context.js";
import { nextId } from "./identity-allocator.js";
import { StepTracker } from "./steps.js";

const TABLE = "Pets" as const;

function isSpecies(value: string): value is PetSpecies {
  return PET_SPECIES.some((s) => s === value);
}

export function petToRow(pet: Pet): string[] {
  return [String(pet.id), pet.nickname, String(pet.ageMonths), pet.species];
}

export function rowToPet(row: string[]): Pet | null {
  const id = parseIntCell(row[0]);
  const nickname = row[1] ?? "";
  const ageMonths = parseIntCell(row[2]);
  const species = row[3] ?? "";
  if (id === null || !nickname.trim() || ageMonths === null || !isSpecies(species)) {
    return null;
  }
  return { id, nickname, ageMonths, species };
}

async function readPets(ctx: ServiceContext): Promise<Pet[]> {
  const rows = await ctx.store.readAllRows(TABLE);
  const pets: Pet[] = [];
  rows.slice(1).forEach((row, i) => {
    const pet = rowToPet(row);
    if (!pet) {
      ctx.log.info({ table: TABLE, rowIndex: i + 2 }, "malformed_row: skipping pet row");
      return;
    }
    pets.push(pet);
  });
  return pets;
}

export async function createPet(
  ctx: ServiceContext,
  input: PetInput,
  steps: StepTracker = new StepTracker()
): Promise<Pet> {
  const id = await steps.run("allocate_id", () => nextId(ctx, TABLE));
  const pet: Pet = { id, ...input };
  await steps.run("append_record", () => ctx.store.appendRow(TABLE, petToRow(pet)));
  return pet;
}

export async function listPets(ctx: ServiceContext): Promise<Pet[]> {
  return readPets(ctx);
}

export async function findPetById(ctx: ServiceContext, id: number): Promise<Pet | null> {
  const pets = await readPets(ctx);
  return pets.find((p) => p.id === id) ?? null;
}

/** Same fresh-read-then-delete contract as deleteChildById */
export async function deletePetById(ctx: ServiceContext, id: number): Promise<boolean> {
  const rows = await ctx.store.readAllRows(TABLE);
  const position = rows.findIndex((row, i) => i > 0 && parseIntCell(row[0]) === id);
  if (position === -1) return false;

  await ctx.store.deleteRow(TABLE, position + 1);
  return true;
}
