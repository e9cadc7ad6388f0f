import { z } from "zod";
import type { PetSpecies } from "../types/records.js";

// ── Helpers ─────────────────────────────────────────────────────────────────

/** First letter upper case, the rest lower case ("mcKAY" -> "Mckay") */
export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

const nameField = (label: string) =>
  z.string().trim().min(1, `${label} cannot be empty`).transform(capitalize);

/** Accepts a JSON integer or a string of digits */
const intField = (label: string, min: number, max: number) =>
  z
    .union([z.number(), z.string().trim().regex(/^\d+$/, `${label} must be a whole number`).transform(Number)])
    .pipe(
      z
        .number()
        .int(`${label} must be a whole number`)
        .min(min, `${label} must be between ${min} and ${max}`)
        .max(max, `${label} must be between ${min} and ${max}`)
    );

const idField = (label: string) =>
  z
    .union([z.number(), z.string().trim().regex(/^\d+$/, `${label} must be a number`).transform(Number)])
    .pipe(
      z
        .number()
        .int(`${label} must be a positive integer`)
        .positive(`${label} must be a positive integer`)
        .max(Number.MAX_SAFE_INTEGER, `${label} is too large`)
    );

const SPECIES_ALIASES = new Map<string, PetSpecies>([
  ["p", "puppy"],
  ["puppy", "puppy"],
  ["k", "kitty"],
  ["kitty", "kitty"],
]);

// ── Children ────────────────────────────────────────────────────────────────

export const childCreateSchema = z.object({
  firstName: nameField("firstName"),
  lastName: nameField("lastName"),
  ageYears: intField("ageYears", 5, 18),
});

// ── Pets ────────────────────────────────────────────────────────────────────

export const petCreateSchema = z.object({
  nickname: nameField("nickname"),
  ageMonths: intField("ageMonths", 0, 12),
  species: z
    .string()
    .trim()
    .transform((value, ctx): PetSpecies => {
      const species = SPECIES_ALIASES.get(value.toLowerCase());
      if (!species) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "species must be 'puppy' or 'kitty' (or 'p' / 'k')",
        });
        return z.NEVER;
      }
      return species;
    }),
});

// ── Links ───────────────────────────────────────────────────────────────────

export const linkCreateSchema = z.object({
  childId: idField("childId"),
  petId: idField("petId"),
  /** Shorthand for both overrides */
  override: z.boolean().optional(),
  replaceChildLink: z.boolean().optional(),
  reassignPet: z.boolean().optional(),
});

// ── Params ──────────────────────────────────────────────────────────────────

export const idParamSchema = z.object({
  id: idField("id"),
});

export type ChildCreateBody = z.infer<typeof childCreateSchema>;
export type PetCreateBody = z.infer<typeof petCreateSchema>;
export type LinkCreateBody = z.infer<typeof linkCreateSchema>;
