import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import Papa from "papaparse";
import { logger } from "./logger";
import type { RosterRow } from "./types";

export const SCHOOL_COLUMN = "School";
export const REGION_COLUMN = "State/UT";

export async function loadRoster(path: string): Promise<RosterRow[]> {
  const raw = await readFile(path, "utf-8");
  const parsed = Papa.parse<RosterRow>(raw.replace(/^\uFEFF/, ""), {
    header: true,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
  });

  for (const e of parsed.errors.slice(0, 5)) {
    logger.warn(`CSV row ${e.row ?? "?"}: ${e.message}`);
  }

  const fields = parsed.meta.fields ?? [];
  for (const col of [SCHOOL_COLUMN, REGION_COLUMN]) {
    if (!fields.includes(col)) throw new Error(`Roster ${path} is missing the "${col}" column`);
  }

  return parsed.data;
}

export async function saveJson<T>(rows: T[], path: string) {
  await mkdir(dirname(path), { recursive: true });
  // rename over the target so an interrupted write never truncates it
  const tmp = `${path}.tmp`;
  await writeFile(tmp, JSON.stringify(rows, null, 2), "utf-8");
  await rename(tmp, path);
  return path;
}

export async function saveCsv<T extends Record<string, string>>(rows: T[], path: string) {
  await mkdir(dirname(path), { recursive: true });

  if (rows.length === 0) {
    await writeFile(path, "", "utf-8");
    return path;
  }

  const columns: string[] = [];
  for (const r of rows) {
    for (const k of Object.keys(r)) if (!columns.includes(k)) columns.push(k);
  }

  await writeFile(path, Papa.unparse(rows, { columns }), "utf-8");
  return path;
}
