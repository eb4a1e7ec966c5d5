import fs from "node:fs";
import path from "node:path";
import { PetProfileSchema } from "../types.js";
import type { PetProfile } from "../types.js";
import { formatTimestamp } from "../utils/time.js";
import { log } from "../utils/logger.js";

export class RecordStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RecordStoreError";
  }
}

export interface RecordStore {
  /** Path of the backing JSON file */
  readonly filePath: string;
  /** Append a snapshot stamped with the current time and return it. */
  append(profile: PetProfile): PetProfile;
  /** Every valid stored snapshot, oldest first. */
  loadAll(): PetProfile[];
}

export interface RecordStoreOptions {
  now?: () => Date;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Append-only log of profile snapshots kept as one JSON array on disk.
 *
 * Every append reads the whole file and rewrites it. File access is
 * synchronous, so one read-modify-write finishes before any other request
 * handler in this process can start another. Separate processes writing the
 * same file are not coordinated.
 */
export function createRecordStore(
  filePath: string,
  options: RecordStoreOptions = {},
): RecordStore {
  const now = options.now ?? (() => new Date());

  /** Raw entries as stored, including ones that no longer validate. */
  function readEntries(): unknown[] {
    if (!fs.existsSync(filePath)) return [];

    let content: string;
    try {
      content = fs.readFileSync(filePath, "utf-8");
    } catch (err) {
      throw new RecordStoreError(
        `Could not read records file ${filePath}: ${describe(err)}`,
        { cause: err },
      );
    }

    if (content.trim() === "") return [];

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new RecordStoreError(
        `Records file ${filePath} is not valid JSON: ${describe(err)}`,
        { cause: err },
      );
    }

    if (!Array.isArray(parsed)) {
      throw new RecordStoreError(
        `Records file ${filePath} must contain a JSON array`,
      );
    }
    return parsed;
  }

  return {
    filePath,

    append(profile: PetProfile): PetProfile {
      const entries = readEntries();
      const record: PetProfile = {
        ...profile,
        timestamp: formatTimestamp(now()),
      };
      entries.push(record);

      try {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, JSON.stringify(entries, null, 2));
      } catch (err) {
        throw new RecordStoreError(
          `Could not write records file ${filePath}: ${describe(err)}`,
          { cause: err },
        );
      }

      return record;
    },

    loadAll(): PetProfile[] {
      const records: PetProfile[] = [];
      readEntries().forEach((entry, index) => {
        const result = PetProfileSchema.safeParse(entry);
        if (result.success) {
          records.push(result.data);
        } else {
          log.warn(`Skipping invalid record #${index + 1} in ${filePath}`);
        }
      });
      return records;
    },
  };
}
