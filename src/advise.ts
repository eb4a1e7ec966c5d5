import type { RecommendationClient } from "./client.js";
import { renderReport } from "./output/report.js";
import { buildPrompt } from "./prompt.js";
import type { PromptRequest } from "./prompt.js";
import type { RecordStore } from "./records/store.js";
import type { Category, PetProfile, RecommendationSet } from "./types.js";

export interface AdviceDeps {
  client: RecommendationClient;
  store: RecordStore;
  now?: () => Date;
  /** Called before each model call, with the category being generated */
  onStep?: (category: Category) => void;
}

export interface AdviceOptions {
  /** Build the PDF report; care only, adds a diet guide */
  report?: boolean;
  save?: boolean;
}

export interface AdviceResult {
  /** Text for the requested category, when that call succeeded */
  text?: string;
  report?: Buffer;
  saved?: PetProfile;
  errors: string[];
  warnings: string[];
}

/**
 * One category of recommendations for the terminal. The report and the save
 * happen only when every model call in the run succeeded.
 */
export async function runAdvice(
  deps: AdviceDeps,
  request: PromptRequest,
  options: AdviceOptions = {},
): Promise<AdviceResult> {
  const { client, store } = deps;
  const now = deps.now ?? (() => new Date());
  const result: AdviceResult = { errors: [], warnings: [] };

  const withReport = options.report === true && request.category === "care";
  if (options.report && !withReport) {
    result.warnings.push("--pdf only applies to the care category; skipped");
  }

  const sections: RecommendationSet = new Map();
  if (withReport) {
    deps.onStep?.("diet");
    const diet = await client.generate(
      buildPrompt({ category: "diet", profile: request.profile }),
    );
    if (diet.ok) sections.set("Diet Recommendations", diet.text);
    else result.errors.push(diet.error);
  }

  deps.onStep?.(request.category);
  const rec = await client.generate(buildPrompt(request));
  if (!rec.ok) {
    result.errors.push(rec.error);
    return result;
  }
  result.text = rec.text;
  if (result.errors.length > 0) return result;

  if (withReport) {
    sections.set("Care Recommendations", rec.text);
    result.report = renderReport(request.profile, sections, now());
  }
  if (options.save) {
    result.saved = store.append(request.profile);
  }
  return result;
}
