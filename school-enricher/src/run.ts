import type { CheckpointStore } from "./checkpoint";
import type { EnricherConfig } from "./config";
import type { Enricher } from "./enrich";
import { logger } from "./logger";
import { loadRoster, saveCsv } from "./save";
import { describeError } from "./utils";

export type RunPaths = Pick<EnricherConfig, "inputPath" | "outputCsvPath">;

export type RunDeps = {
  store: CheckpointStore;
  enricher: Enricher;
  signal?: AbortSignal;
};

/**
 * Loads the roster, enriches it and exports whatever the checkpoint holds to
 * CSV. Errors are logged, not thrown; resolves with the final record count.
 */
export async function runEnrichment(paths: RunPaths, { store, enricher, signal }: RunDeps): Promise<number> {
  try {
    logger.step(`[1/2] Loading roster: ${paths.inputPath}`);
    const rows = await loadRoster(paths.inputPath);
    logger.info(`Loaded ${rows.length} records from ${paths.inputPath}`);

    logger.step("[2/2] Enriching schools ...");
    const summary = await enricher.run(rows, signal);
    logger.info(
      `Enriched ${summary.processed}, skipped ${summary.skipped}, failed ${summary.failed}` +
        (summary.interrupted ? " (interrupted)" : "")
    );

    if (store.size) {
      const csvPath = await saveCsv([...store.all()], paths.outputCsvPath);
      logger.success(`CSV file saved to ${csvPath}`);
    } else {
      logger.warn("No data to save to CSV");
    }
  } catch (err) {
    logger.error(`Error in main execution: ${describeError(err)}`);
  } finally {
    logger.info(`Process completed. Total records processed: ${store.size}`);
  }

  return store.size;
}
