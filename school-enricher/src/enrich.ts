import type { CheckpointStore } from "./checkpoint";
import { logger } from "./logger";
import { emptyPageInfo, mergePageInfo } from "./merge";
import { REGION_COLUMN, SCHOOL_COLUMN } from "./save";
import type { EnrichedRecord, PageInfo, RosterRow, RowOutcome, RunSummary } from "./types";
import { describeError, sleep } from "./utils";

export type EnricherDeps = {
  search: (schoolName: string, region: string) => Promise<string[]>;
  scrape: (url: string, regionHint: string) => Promise<PageInfo>;
  store: CheckpointStore;
  sleep?: (ms: number) => Promise<void>;
};

export type EnricherOptions = {
  rowDelayMs?: number;
};

function cell(row: RosterRow, column: string): string {
  return String(row[column] ?? "").replace(/\r?\n/g, " ").trim();
}

export class Enricher {
  private readonly rowDelayMs: number;
  private readonly pause: (ms: number) => Promise<void>;

  constructor(private readonly deps: EnricherDeps, opts: EnricherOptions = {}) {
    this.rowDelayMs = opts.rowDelayMs ?? 1000;
    this.pause = deps.sleep ?? sleep;
  }

  async processRow(row: RosterRow, index: number, total: number): Promise<RowOutcome> {
    const { store } = this.deps;
    const school = cell(row, SCHOOL_COLUMN);
    const region = cell(row, REGION_COLUMN);
    const label = `${index + 1}/${total}`;

    if (store.has(school, region)) {
      logger.info(`${label} - ${school}: Already processed, skipping`);
      return "skipped";
    }

    logger.step(`${label} - Processing: ${school}, ${region}`);

    const record: EnrichedRecord = { ...row, Website: "", ...emptyPageInfo() };

    const websites = await this.deps.search(school, region);
    if (websites.length === 0) {
      store.append(record);
      await store.save();
      await this.pause(this.rowDelayMs);
      return "no_website";
    }

    record.Website = websites[0];

    // URL order is priority order; a field found earlier is never replaced
    const merged = emptyPageInfo();
    for (const url of websites) {
      mergePageInfo(merged, await this.deps.scrape(url, region));
    }
    Object.assign(record, merged);

    logger.success(
      `Final merged info for ${school}: Email=${Boolean(record.Email)}, Tel=${Boolean(record.Tel)}, ` +
        `District=${Boolean(record.District)}, Address=${Boolean(record.Address)}`
    );

    store.append(record);
    await store.save();
    await this.pause(this.rowDelayMs);
    return "enriched";
  }

  /**
   * Walks the roster from the first row not yet covered by the checkpoint.
   * A failing row is logged and skipped; an aborted signal stops the loop at
   * the next row boundary.
   */
  async run(rows: RosterRow[], signal?: AbortSignal): Promise<RunSummary> {
    const start = this.deps.store.size;
    const summary: RunSummary = {
      resumedFrom: start,
      processed: 0,
      skipped: 0,
      failed: 0,
      totalRecords: start,
      interrupted: false,
    };

    if (start > 0) logger.info(`Resuming from record ${start + 1}/${rows.length}`);

    for (let index = start; index < rows.length; index++) {
      if (signal?.aborted) {
        summary.interrupted = true;
        break;
      }

      try {
        const outcome = await this.processRow(rows[index], index, rows.length);
        if (outcome === "skipped") summary.skipped++;
        else summary.processed++;
      } catch (err) {
        summary.failed++;
        logger.error(`Error processing row ${index}: ${describeError(err)}`);
      }
    }

    summary.totalRecords = this.deps.store.size;
    return summary;
  }
}
