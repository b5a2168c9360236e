import "dotenv/config";

import { CheckpointStore } from "./checkpoint";
import { ConfigError, loadConfig } from "./config";
import { Enricher } from "./enrich";
import { createHttp, createPageFetcher } from "./http";
import { logger } from "./logger";
import { scrapePage } from "./scrape";
import { runEnrichment } from "./run";
import { SerperClient, searchSchoolWebsites } from "./search";
import { describeError } from "./utils";

async function main() {
  const config = loadConfig();

  const http = createHttp({ userAgent: config.userAgent, timeoutMs: config.fetchTimeoutMs });
  const fetcher = createPageFetcher(http);
  const client = new SerperClient(http, config.apiKey, config.searchEndpoint);

  const store = new CheckpointStore(config.outputJsonPath);
  await store.load();

  const enricher = new Enricher(
    {
      store,
      search: (name, region) =>
        searchSchoolWebsites(client, name, region, {
          retries: config.searchRetries,
          backoffMs: config.searchBackoffMs,
          denylist: config.denylist,
        }),
      scrape: (url, region) =>
        scrapePage(fetcher, url, region, {
          districtPolicy: config.districtPolicy,
          addressPolicy: config.addressPolicy,
        }),
    },
    { rowDelayMs: config.rowDelayMs }
  );

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("\nProcess interrupted by user. Finishing the current row; data is saved to JSON.");
    controller.abort();
  });

  await runEnrichment(config, { store, enricher, signal: controller.signal });
}

main().catch((e) => {
  logger.error(e instanceof ConfigError ? e.message : `Error: ${describeError(e)}`);
  process.exit(1);
});
