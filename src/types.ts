import { z } from "zod";

// ─── Pet Profile ─────────────────────────────────────────────────────────────

export const SPECIES = ["Dog", "Cat"] as const;

/** Upper bound on each free-text field embedded in a prompt */
export const MAX_FREE_TEXT = 1000;

export const PetProfileSchema = z.object({
  name: z.string().describe("Pet's name"),
  species: z.enum(SPECIES).describe("Pet type"),
  breed: z.string().describe("Breed, free text"),
  age: z.number().min(0).max(30).describe("Age in years"),
  weight: z.number().min(0).max(100).describe("Weight in kg"),
  healthConditions: z
    .string()
    .default("")
    .describe("Known health conditions, empty when none"),
  favoriteFoods: z.string().default("").describe("Favorite foods"),
  allergies: z.string().default("").describe("Known allergies"),
  timestamp: z
    .string()
    .describe("Local time the snapshot was taken, YYYY-MM-DD HH:mm:ss"),
});

export type PetProfile = z.infer<typeof PetProfileSchema>;

/**
 * A profile exported from the records table and uploaded back for comparison.
 * Older exports may lack a timestamp.
 */
export const ImportedProfileSchema = PetProfileSchema.extend({
  timestamp: z.string().default(""),
});

// ─── Recommendations ─────────────────────────────────────────────────────────

export const CATEGORIES = [
  "diet",
  "care",
  "emergency",
  "training",
  "seasonal",
  "comparison",
] as const;
export type Category = (typeof CATEGORIES)[number];

/** Category label → generated text, in the order the sections were produced */
export type RecommendationSet = Map<string, string>;

/** Fixed generation parameters for every recommendation call */
export const GENERATION = {
  temperature: 0.5,
  maxTokens: 500,
} as const;

// ─── Settings ────────────────────────────────────────────────────────────────

export const BUILTIN_PROVIDERS = ["openai", "anthropic", "gemini"] as const;
export type BuiltinProvider = (typeof BUILTIN_PROVIDERS)[number];

export const ModelSettingsSchema = z.object({
  provider: z
    .string()
    .describe("Provider name: openai, anthropic, gemini, or custom"),
  model: z.string().describe("Model name to pass to the provider API"),
  displayName: z.string().optional().describe("Human-readable display name"),
  envVar: z
    .string()
    .optional()
    .describe(
      "Custom env var name for API key (auto-resolved for built-in providers)",
    ),
});

export interface ModelSettings {
  /** A built-in provider, or any custom name served by an OpenAI-compatible host */
  provider: string;
  model: string;
  displayName?: string;
  envVar?: string;
}

export const SettingsFileSchema = z.object({
  model: ModelSettingsSchema.optional(),
  recordsFile: z
    .string()
    .optional()
    .describe("Path of the JSON record log, relative to the project root"),
  port: z.number().int().min(1).max(65535).optional(),
});

export interface Settings {
  model: ModelSettings;
  recordsFile: string;
  port: number;
}
