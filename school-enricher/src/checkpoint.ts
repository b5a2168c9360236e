import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { logger } from "./logger";
import { REGION_COLUMN, SCHOOL_COLUMN, saveJson } from "./save";
import type { EnrichedRecord } from "./types";
import { describeError, identityKey } from "./utils";

const StoredRecordSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));
const CheckpointSchema = z.array(StoredRecordSchema);

function toRecord(raw: z.infer<typeof StoredRecordSchema>): EnrichedRecord {
  const cells: Record<string, string> = {};
  for (const [k, v] of Object.entries(raw)) cells[k] = v === null ? "" : String(v);
  return { Website: "", District: "", Address: "", Tel: "", Email: "", ...cells };
}

/**
 * Append-only list of enriched records mirrored to a JSON file. The whole file
 * is rewritten on every save.
 */
export class CheckpointStore {
  private records: EnrichedRecord[] = [];
  private keys = new Set<string>();

  constructor(readonly path: string) {}

  get size(): number {
    return this.records.length;
  }

  all(): readonly EnrichedRecord[] {
    return this.records;
  }

  async load(): Promise<number> {
    this.records = [];
    this.keys.clear();
    if (!existsSync(this.path)) return 0;

    try {
      const parsed = CheckpointSchema.parse(JSON.parse(await readFile(this.path, "utf-8")));
      for (const raw of parsed) this.track(toRecord(raw));
      logger.info(`Loaded ${this.records.length} existing records from ${this.path}`);
    } catch (err) {
      logger.error(`Error loading existing JSON ${this.path}: ${describeError(err)}`);
      this.records = [];
      this.keys.clear();
    }
    return this.records.length;
  }

  has(school: string, region: string): boolean {
    return this.keys.has(identityKey(school, region));
  }

  append(record: EnrichedRecord): void {
    this.track(record);
  }

  async save(): Promise<boolean> {
    try {
      await saveJson(this.records, this.path);
      logger.debug(`Data saved to ${this.path}`);
      return true;
    } catch (err) {
      logger.error(`Error saving JSON ${this.path}: ${describeError(err)}`);
      return false;
    }
  }

  private track(record: EnrichedRecord): void {
    this.records.push(record);
    this.keys.add(identityKey(record[SCHOOL_COLUMN] ?? "", record[REGION_COLUMN] ?? ""));
  }
}
