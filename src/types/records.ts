// src/types/records.ts
// Record shapes for the Children, Pets and Owners tables

export const PET_SPECIES = ["puppy", "kitty"] as const;
export type PetSpecies = (typeof PET_SPECIES)[number];

export interface Child {
  id: number;
  firstName: string;
  lastName: string;
  ageYears: number;
}

export type ChildInput = Omit<Child, "id">;

export interface Pet {
  id: number;
  nickname: string;
  ageMonths: number;
  species: PetSpecies;
}

export type PetInput = Omit<Pet, "id">;

/** A row of the Owners table. petId null means the child is currently unlinked. */
export interface Link {
  childName: string;
  petId: number | null;
}

/** A Link together with its positional row index (header is row 1) */
export interface LocatedLink {
  rowIndex: number;
  link: Link;
}

export function childFullName(child: Pick<Child, "firstName" | "lastName">): string {
  return `${child.firstName} ${child.lastName}`;
}
