import type { RecommendationClient } from "./client.js";
import { renderReport } from "./output/report.js";
import {
  buildCarePrompt,
  buildComparisonPrompt,
  buildDietPrompt,
  buildEmergencyPrompt,
  buildSeasonalPrompt,
  buildTrainingPrompt,
} from "./prompt.js";
import { RecordStoreError } from "./records/store.js";
import type { RecordStore } from "./records/store.js";
import type { PetProfile, RecommendationSet } from "./types.js";
import { monthName } from "./utils/time.js";
import { log } from "./utils/logger.js";

// ─── Panels ──────────────────────────────────────────────────────────────────

export const PANELS = [
  { id: "care", label: "Care Guide", action: "Generate Care Recommendations" },
  { id: "emergency", label: "Emergency Care", action: "Get Emergency Guide" },
  { id: "training", label: "Training", action: "Get Training Tips" },
  { id: "seasonal", label: "Seasonal Care", action: "Get Seasonal Care Tips" },
  { id: "records", label: "Health Records", action: "Save Health Record" },
  { id: "analysis", label: "Previous Report Analysis", action: "Analyze Changes" },
] as const;

export type PanelId = (typeof PANELS)[number]["id"];

export function isPanelId(value: string): value is PanelId {
  return PANELS.some((p) => p.id === value);
}

export const EMERGENCY_CONTACTS = [
  "Clinic Hours: 24/7",
  "Emergency Number: [Your Clinic Phone]",
  "After Hours Care: Available",
] as const;

export interface ResultSection {
  heading: string;
  text: string;
}

export interface PanelResult {
  panel: PanelId;
  sections: ResultSection[];
  /** Static lines shown after a successful emergency guide */
  contacts?: readonly string[];
  /** PDF of the care guide, only when every call succeeded */
  report?: Buffer;
  /** Record appended to the store by this action */
  saved?: PetProfile;
  notice?: string;
  errors: string[];
}

export interface PanelDeps {
  client: RecommendationClient;
  store: RecordStore;
  now?: () => Date;
}

function emptyResult(panel: PanelId): PanelResult {
  return { panel, sections: [], errors: [] };
}

function storageMessage(err: unknown): string {
  if (err instanceof RecordStoreError) return err.message;
  return `Could not save health record: ${err instanceof Error ? err.message : String(err)}`;
}

// ─── Actions ─────────────────────────────────────────────────────────────────

/**
 * Run one panel's action for the profile currently in the form.
 * Calls are issued one after another; a failed call skips the steps that
 * depend on its text.
 */
export function createPanelActions(deps: PanelDeps) {
  const { client, store } = deps;
  const now = deps.now ?? (() => new Date());

  async function single(
    panel: PanelId,
    heading: string,
    prompt: string,
  ): Promise<PanelResult> {
    const result = emptyResult(panel);
    const rec = await client.generate(prompt);
    if (rec.ok) {
      result.sections.push({ heading, text: rec.text });
    } else {
      result.errors.push(rec.error);
    }
    return result;
  }

  function save(result: PanelResult, profile: PetProfile): void {
    try {
      result.saved = store.append(profile);
      log.panel(result.panel, `saved record for ${profile.name || "unnamed pet"}`);
    } catch (err) {
      const message = storageMessage(err);
      log.error(message);
      result.errors.push(message);
    }
  }

  return {
    /** Diet and care guides, the PDF report, and a stored snapshot. */
    async careGuide(profile: PetProfile): Promise<PanelResult> {
      const result = emptyResult("care");
      const diet = await client.generate(buildDietPrompt(profile));
      const care = await client.generate(buildCarePrompt(profile));

      if (!diet.ok) result.errors.push(diet.error);
      if (!care.ok) result.errors.push(care.error);
      if (!diet.ok || !care.ok) return result;

      const recommendations: RecommendationSet = new Map([
        ["Diet Recommendations", diet.text],
        ["Care Recommendations", care.text],
      ]);
      for (const [heading, text] of recommendations) {
        result.sections.push({ heading, text });
      }

      result.report = renderReport(profile, recommendations, now());
      save(result, profile);
      return result;
    },

    async emergency(profile: PetProfile): Promise<PanelResult> {
      const result = await single(
        "emergency",
        "Emergency Care Guide",
        buildEmergencyPrompt(profile),
      );
      if (result.errors.length === 0) result.contacts = EMERGENCY_CONTACTS;
      return result;
    },

    training(profile: PetProfile): Promise<PanelResult> {
      return single("training", "Training Guide", buildTrainingPrompt(profile));
    },

    seasonal(profile: PetProfile): Promise<PanelResult> {
      return single(
        "seasonal",
        "Seasonal Care Guide",
        buildSeasonalPrompt(profile, monthName(now())),
      );
    },

    /** Explicit "Save Health Record" from the records panel. */
    saveRecord(profile: PetProfile): PanelResult {
      const result = emptyResult("records");
      save(result, profile);
      if (result.saved) result.notice = "Health record saved successfully!";
      return result;
    },

    async analysis(
      profile: PetProfile,
      previous: PetProfile | undefined,
    ): Promise<PanelResult> {
      if (!previous) {
        const result = emptyResult("analysis");
        result.errors.push(
          "Upload a previous report (JSON) to analyze changes.",
        );
        return result;
      }
      return single(
        "analysis",
        "Changes Analysis",
        buildComparisonPrompt(profile, previous),
      );
    },
  };
}

export type PanelActions = ReturnType<typeof createPanelActions>;
