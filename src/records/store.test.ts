import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { rex } from "../test/fixtures.js";
import { createRecordStore, RecordStoreError } from "./store.js";

let dir: string;
let file: string;

/** A clock that advances one second per call, from 2026-03-14 10:15:30. */
function tickingClock() {
  let seconds = 30;
  return () => new Date(2026, 2, 14, 10, 15, seconds++);
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "petcare-records-"));
  file = path.join(dir, "pet_data.json");
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("loadAll", () => {
  it("returns an empty list when the file does not exist", () => {
    expect(createRecordStore(file).loadAll()).toEqual([]);
  });

  it("returns an empty list for an empty file", () => {
    fs.writeFileSync(file, "");
    expect(createRecordStore(file).loadAll()).toEqual([]);
  });

  it("fills free-text fields missing from older records", () => {
    const { favoriteFoods: _foods, allergies: _allergies, ...older } = rex;
    fs.writeFileSync(file, JSON.stringify([older]));

    expect(createRecordStore(file).loadAll()).toEqual([
      { ...rex, favoriteFoods: "", allergies: "" },
    ]);
  });

  it("skips entries that are not profiles", () => {
    fs.writeFileSync(file, JSON.stringify([{ note: "scratch" }, rex]));
    expect(createRecordStore(file).loadAll()).toEqual([rex]);
  });

  it("raises a store error for corrupt JSON", () => {
    fs.writeFileSync(file, "[{ not json");
    expect(() => createRecordStore(file).loadAll()).toThrow(RecordStoreError);
  });

  it("raises a store error when the file is not an array", () => {
    fs.writeFileSync(file, JSON.stringify(rex));
    expect(() => createRecordStore(file).loadAll()).toThrow(
      `Records file ${file} must contain a JSON array`,
    );
  });
});

describe("append", () => {
  it("stores the profile with a fresh timestamp", () => {
    const store = createRecordStore(file, { now: tickingClock() });

    const saved = store.append(rex);
    const records = store.loadAll();

    expect(saved).toEqual({ ...rex, timestamp: "2026-03-14 10:15:30" });
    expect(records[records.length - 1]).toEqual(saved);
    expect(rex.timestamp).toBe("2026-03-14 10:00:00");
  });

  it("keeps every append in order with distinct timestamps", () => {
    const store = createRecordStore(file, { now: tickingClock() });

    store.append(rex);
    store.append({ ...rex, weight: 29 });
    const records = store.loadAll();

    expect(records).toHaveLength(2);
    expect(records.map((r) => r.timestamp)).toEqual([
      "2026-03-14 10:15:30",
      "2026-03-14 10:15:31",
    ]);
    expect(records.map((r) => r.weight)).toEqual([28, 29]);
  });

  it("keeps entries it cannot read when rewriting the file", () => {
    fs.writeFileSync(file, JSON.stringify([{ note: "scratch" }]));
    const store = createRecordStore(file, { now: tickingClock() });

    store.append(rex);

    const raw: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
    expect(raw).toEqual([
      { note: "scratch" },
      { ...rex, timestamp: "2026-03-14 10:15:30" },
    ]);
  });

  it("creates the parent directory when needed", () => {
    const nested = path.join(dir, "data", "pets.json");
    createRecordStore(nested, { now: tickingClock() }).append(rex);
    expect(fs.existsSync(nested)).toBe(true);
  });

  it("refuses to overwrite a corrupt file", () => {
    fs.writeFileSync(file, "{{");
    const store = createRecordStore(file);

    expect(() => store.append(rex)).toThrow(RecordStoreError);
    expect(fs.readFileSync(file, "utf-8")).toBe("{{");
  });
});
