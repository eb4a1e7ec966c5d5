import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Recommendation, RecommendationClient } from "./client.js";
import { createPanelActions, EMERGENCY_CONTACTS, isPanelId } from "./panels.js";
import {
  buildCarePrompt,
  buildComparisonPrompt,
  buildDietPrompt,
} from "./prompt.js";
import { RecordStoreError } from "./records/store.js";
import type { RecordStore } from "./records/store.js";
import { previousRex, rex } from "./test/fixtures.js";
import type { PetProfile } from "./types.js";

const failure: Recommendation = {
  ok: false,
  error: "Error generating recommendation: 429 Too Many Requests",
};

/** Client answering with the given responses in order, then "ok". */
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

describe("isPanelId", () => {
  it("accepts the six panels only", () => {
    expect(isPanelId("records")).toBe(true);
    expect(isPanelId("analysis")).toBe(true);
    expect(isPanelId("diet")).toBe(false);
  });
});

describe("careGuide", () => {
  it("asks for diet then care, renders the report and saves the profile", async () => {
    const { client, generate } = stubClient(
      { ok: true, text: "DIET" },
      { ok: true, text: "CARE" },
    );
    const { store, append } = memoryStore();
    const actions = createPanelActions({ client, store });

    const result = await actions.careGuide(rex);

    expect(generate.mock.calls.map(([prompt]) => prompt)).toEqual([
      buildDietPrompt(rex),
      buildCarePrompt(rex),
    ]);
    expect(result.sections).toEqual([
      { heading: "Diet Recommendations", text: "DIET" },
      { heading: "Care Recommendations", text: "CARE" },
    ]);
    expect(result.report?.subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(append).toHaveBeenCalledTimes(1);
    expect(append).toHaveBeenCalledWith(rex);
    expect(result.saved?.timestamp).toBe("2026-03-14 10:15:30");
    expect(result.errors).toEqual([]);
  });

  it("skips the report and the save when a call fails", async () => {
    const { client, generate } = stubClient({ ok: true, text: "DIET" }, failure);
    const { store, append } = memoryStore();
    const actions = createPanelActions({ client, store });

    const result = await actions.careGuide(rex);

    expect(generate).toHaveBeenCalledTimes(2);
    expect(result.errors).toEqual([failure.error]);
    expect(result.sections).toEqual([]);
    expect(result.report).toBeUndefined();
    expect(result.saved).toBeUndefined();
    expect(append).not.toHaveBeenCalled();
  });

  it("keeps the guide and report when saving fails", async () => {
    const { client } = stubClient(
      { ok: true, text: "DIET" },
      { ok: true, text: "CARE" },
    );
    const { store, append } = memoryStore();
    append.mockImplementation(() => {
      throw new RecordStoreError("Could not write records file memory: EACCES");
    });
    const actions = createPanelActions({ client, store });

    const result = await actions.careGuide(rex);

    expect(result.sections).toHaveLength(2);
    expect(result.report).toBeDefined();
    expect(result.saved).toBeUndefined();
    expect(result.errors).toEqual([
      "Could not write records file memory: EACCES",
    ]);
  });
});

describe("single-call panels", () => {
  it("adds the emergency contacts after a successful guide", async () => {
    const { client } = stubClient({ ok: true, text: "Call the vet" });
    const actions = createPanelActions({ client, store: memoryStore().store });

    const result = await actions.emergency(rex);

    expect(result.sections).toEqual([
      { heading: "Emergency Care Guide", text: "Call the vet" },
    ]);
    expect(result.contacts).toEqual(EMERGENCY_CONTACTS);
  });

  it("shows only the error when the emergency guide fails", async () => {
    const { client } = stubClient(failure);
    const actions = createPanelActions({ client, store: memoryStore().store });

    const result = await actions.emergency(rex);

    expect(result.sections).toEqual([]);
    expect(result.contacts).toBeUndefined();
    expect(result.errors).toEqual([failure.error]);
  });

  it("asks for seasonal care for the current month", async () => {
    const { client, generate } = stubClient();
    const actions = createPanelActions({
      client,
      store: memoryStore().store,
      now: () => new Date(2026, 6, 4),
    });

    const result = await actions.seasonal(rex);

    expect(generate.mock.calls[0][0]).toContain(
      "Provide seasonal care tips for July for a Dog, Labrador.",
    );
    expect(result.sections[0].heading).toBe("Seasonal Care Guide");
  });

  it("labels training tips", async () => {
    const { client } = stubClient({ ok: true, text: "Sit: 5 minutes" });
    const actions = createPanelActions({ client, store: memoryStore().store });

    const result = await actions.training(rex);

    expect(result.sections).toEqual([
      { heading: "Training Guide", text: "Sit: 5 minutes" },
    ]);
  });
});

describe("saveRecord", () => {
  it("appends the profile and confirms", () => {
    const { client, generate } = stubClient();
    const { store, append } = memoryStore();
    const actions = createPanelActions({ client, store });

    const result = actions.saveRecord(rex);

    expect(append).toHaveBeenCalledWith(rex);
    expect(result.notice).toBe("Health record saved successfully!");
    expect(generate).not.toHaveBeenCalled();
  });

  it("reports a storage failure instead of throwing", () => {
    const { client } = stubClient();
    const { store, append } = memoryStore();
    append.mockImplementation(() => {
      throw new Error("disk full");
    });
    const actions = createPanelActions({ client, store });

    const result = actions.saveRecord(rex);

    expect(result.notice).toBeUndefined();
    expect(result.errors).toEqual(["Could not save health record: disk full"]);
  });
});

describe("analysis", () => {
  it("requires an uploaded previous report", async () => {
    const { client, generate } = stubClient();
    const actions = createPanelActions({ client, store: memoryStore().store });

    const result = await actions.analysis(rex, undefined);

    expect(generate).not.toHaveBeenCalled();
    expect(result.errors).toEqual([
      "Upload a previous report (JSON) to analyze changes.",
    ]);
  });

  it("compares the current profile with the previous one", async () => {
    const { client, generate } = stubClient({ ok: true, text: "Gained 3 kg" });
    const actions = createPanelActions({ client, store: memoryStore().store });

    const result = await actions.analysis(rex, previousRex);

    expect(generate).toHaveBeenCalledWith(buildComparisonPrompt(rex, previousRex));
    expect(result.sections).toEqual([
      { heading: "Changes Analysis", text: "Gained 3 kg" },
    ]);
  });
});
