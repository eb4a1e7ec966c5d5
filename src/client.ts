import { buildSystemPrompt } from "./prompt.js";
import { GENERATION } from "./types.js";
import { createTimer } from "./utils/time.js";
import { log } from "./utils/logger.js";

export interface GenerationRequest {
  systemPrompt: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
}

/** The network-facing half of the client: one chat completion, text out. */
export interface TextGenerator {
  generate(request: GenerationRequest): Promise<string>;
}

export type Recommendation =
  | { ok: true; text: string }
  | { ok: false; error: string };

export interface RecommendationClient {
  generate(prompt: string): Promise<Recommendation>;
}

/**
 * Wrap a text generator so that every failure (network, auth, quota, empty
 * or malformed response) comes back as a value instead of a thrown error.
 */
export function createRecommendationClient(
  generator: TextGenerator,
): RecommendationClient {
  const systemPrompt = buildSystemPrompt();

  return {
    async generate(prompt: string): Promise<Recommendation> {
      const timer = createTimer();
      try {
        const text = await generator.generate({
          systemPrompt,
          prompt,
          temperature: GENERATION.temperature,
          maxTokens: GENERATION.maxTokens,
        });

        if (typeof text !== "string" || text.trim() === "") {
          throw new Error("The model returned an empty response");
        }

        log.dim(`Recommendation generated in ${timer.display()}`);
        return { ok: true, text };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        const error = `Error generating recommendation: ${message}`;
        log.error(error);
        return { ok: false, error };
      }
    },
  };
}
