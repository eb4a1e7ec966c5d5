import { beforeEach, describe, expect, it, vi } from "vitest";
import { runAdvice } from "./advise.js";
import type { Recommendation, RecommendationClient } from "./client.js";
import { buildCarePrompt, buildDietPrompt, buildTrainingPrompt } from "./prompt.js";
import type { RecordStore } from "./records/store.js";
import { rex } from "./test/fixtures.js";
import type { PetProfile } from "./types.js";

const failure: Recommendation = {
  ok: false,
  error: "Error generating recommendation: 429 quota exceeded",
};

function stubClient(...responses: Recommendation[]) {
  const generate = vi.fn(
    async (_prompt: string): Promise<Recommendation> => ({ ok: true, text: "ok" }),
  );
  for (const response of responses) generate.mockResolvedValueOnce(response);
  const client: RecommendationClient = { generate };
  return { client, generate };
}

function memoryStore() {
  const append = vi.fn(
    (profile: PetProfile): PetProfile => ({
      ...profile,
      timestamp: "2026-03-14 10:15:30",
    }),
  );
  const store: RecordStore = { filePath: "memory", append, loadAll: () => [] };
  return { store, append };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
  return () => vi.restoreAllMocks();
});

describe("runAdvice", () => {
  it("writes the report and saves when diet and care both succeed", async () => {
    const { client, generate } = stubClient(
      { ok: true, text: "DIET" },
      { ok: true, text: "CARE" },
    );
    const { store, append } = memoryStore();
    const steps: string[] = [];

    const result = await runAdvice(
      { client, store, onStep: (step) => steps.push(step) },
      { category: "care", profile: rex },
      { report: true, save: true },
    );

    expect(steps).toEqual(["diet", "care"]);
    expect(generate.mock.calls.map(([prompt]) => prompt)).toEqual([
      buildDietPrompt(rex),
      buildCarePrompt(rex),
    ]);
    expect(result.text).toBe("CARE");
    expect(result.report?.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(append).toHaveBeenCalledWith(rex);
    expect(result.saved?.timestamp).toBe("2026-03-14 10:15:30");
    expect(result.errors).toEqual([]);
  });

  it("neither reports nor saves when the diet call fails", async () => {
    const { client, generate } = stubClient(failure, { ok: true, text: "CARE" });
    const { store, append } = memoryStore();

    const result = await runAdvice(
      { client, store },
      { category: "care", profile: rex },
      { report: true, save: true },
    );

    expect(generate).toHaveBeenCalledTimes(2);
    expect(result.text).toBe("CARE");
    expect(result.errors).toEqual([failure.error]);
    expect(result.report).toBeUndefined();
    expect(result.saved).toBeUndefined();
    expect(append).not.toHaveBeenCalled();
  });

  it("does not save when the requested category fails", async () => {
    const { client } = stubClient(failure);
    const { store, append } = memoryStore();

    const result = await runAdvice(
      { client, store },
      { category: "training", profile: rex },
      { save: true },
    );

    expect(result).toEqual({ errors: [failure.error], warnings: [] });
    expect(append).not.toHaveBeenCalled();
  });

  it("ignores the report for categories other than care", async () => {
    const { client, generate } = stubClient({ ok: true, text: "SIT" });
    const { store, append } = memoryStore();

    const result = await runAdvice(
      { client, store },
      { category: "training", profile: rex },
      { report: true },
    );

    expect(generate.mock.calls.map(([prompt]) => prompt)).toEqual([
      buildTrainingPrompt(rex),
    ]);
    expect(result).toEqual({
      text: "SIT",
      errors: [],
      warnings: ["--pdf only applies to the care category; skipped"],
    });
    expect(append).not.toHaveBeenCalled();
  });
});
