import { z } from "zod";
import { ImportedProfileSchema, MAX_FREE_TEXT, SPECIES } from "../types.js";
import type { PetProfile } from "../types.js";
import { formatTimestamp } from "../utils/time.js";

/** Raw sidebar values, echoed back into the form after every action. */
export interface ProfileFormValues {
  name: string;
  species: string;
  breed: string;
  age: string;
  weight: string;
  healthConditions: string;
  favoriteFoods: string;
  allergies: string;
}

export const DEFAULT_FORM: ProfileFormValues = {
  name: "",
  species: "Dog",
  breed: "",
  age: "1",
  weight: "5",
  healthConditions: "",
  favoriteFoods: "",
  allergies: "",
};

const FIELDS = [
  "name",
  "species",
  "breed",
  "age",
  "weight",
  "healthConditions",
  "favoriteFoods",
  "allergies",
] as const satisfies readonly (keyof ProfileFormValues)[];

const freeText = (label: string) =>
  z
    .string()
    .max(MAX_FREE_TEXT, `${label} must be at most ${MAX_FREE_TEXT} characters`);

const ProfileFormSchema = z.object({
  name: freeText("Pet's name"),
  species: z.enum(SPECIES, "Pet type must be Dog or Cat"),
  breed: freeText("Breed"),
  age: z.coerce
    .number("Age must be a number")
    .min(0, "Age must be between 0 and 30 years")
    .max(30, "Age must be between 0 and 30 years"),
  weight: z.coerce
    .number("Weight must be a number")
    .min(0, "Weight must be between 0 and 100 kg")
    .max(100, "Weight must be between 0 and 100 kg"),
  healthConditions: freeText("Health conditions"),
  favoriteFoods: freeText("Favorite foods"),
  allergies: freeText("Allergies"),
});

export function readFormValues(params: URLSearchParams): ProfileFormValues {
  const values = { ...DEFAULT_FORM };
  for (const field of FIELDS) {
    const value = params.get(field);
    if (value !== null) values[field] = value;
  }
  return values;
}

export type ParsedProfile =
  | { ok: true; profile: PetProfile }
  | { ok: false; errors: string[] };

/**
 * Turn submitted form values into a profile stamped with the current time.
 * Blank text fields are accepted as-is; only numeric bounds, the species and
 * text length are checked.
 */
export function parseProfileForm(
  values: ProfileFormValues,
  now: Date,
): ParsedProfile {
  // An empty number input coerces to 0; treat it as missing instead
  const result = ProfileFormSchema.safeParse({
    ...values,
    age: values.age.trim() === "" ? undefined : values.age,
    weight: values.weight.trim() === "" ? undefined : values.weight,
  });
  if (!result.success) {
    return { ok: false, errors: result.error.issues.map((i) => i.message) };
  }
  return {
    ok: true,
    profile: { ...result.data, timestamp: formatTimestamp(now) },
  };
}

export type ParsedImport =
  | { ok: true; profile: PetProfile }
  | { ok: false; error: string };

/**
 * Parse an uploaded previous report: a single exported record.
 */
export function parseImportedProfile(json: string): ParsedImport {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return { ok: false, error: "Previous report is not valid JSON." };
  }

  const result = ImportedProfileSchema.safeParse(raw);
  if (!result.success) {
    const fields = [...new Set(result.error.issues.map((i) => i.path.join(".")))];
    return {
      ok: false,
      error: `Previous report is missing or has invalid fields: ${fields.join(", ")}`,
    };
  }
  return { ok: true, profile: result.data };
}
