import { z } from "zod";
import type { AddressPolicy, DistrictPolicy } from "./types";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120 Safari/537.36";

export const SERPER_ENDPOINT = "https://google.serper.dev/search";

const EnvSchema = z.object({
  SERPER_API_KEY: z.string().trim().min(1, "SERPER_API_KEY is required"),
  SERPER_ENDPOINT: z.string().url().default(SERPER_ENDPOINT),
  INPUT_PATH: z.string().min(1).default("data/in/schools.csv"),
  OUTPUT_JSON_PATH: z.string().min(1).default("data/out/schools_enriched.json"),
  OUTPUT_CSV_PATH: z.string().min(1).default("data/out/schools_enriched.csv"),
  SEARCH_RETRIES: z.coerce.number().int().positive().default(5),
  SEARCH_BACKOFF_MS: z.coerce.number().int().min(0).default(2000),
  ROW_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  SEARCH_DENYLIST: z.string().default("indiastudychannel.com"),
  DISTRICT_POLICY: z.enum(["simple", "rich"]).default("rich"),
  ADDRESS_POLICY: z.enum(["single", "merged"]).default("merged"),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
});

export type EnricherConfig = {
  apiKey: string;
  searchEndpoint: string;
  inputPath: string;
  outputJsonPath: string;
  outputCsvPath: string;
  denylist: string[];
  searchRetries: number;
  searchBackoffMs: number;
  rowDelayMs: number;
  fetchTimeoutMs: number;
  userAgent: string;
  districtPolicy: DistrictPolicy;
  addressPolicy: AddressPolicy;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnricherConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration - ${details}`);
  }

  const e = parsed.data;
  return {
    apiKey: e.SERPER_API_KEY,
    searchEndpoint: e.SERPER_ENDPOINT,
    inputPath: e.INPUT_PATH,
    outputJsonPath: e.OUTPUT_JSON_PATH,
    outputCsvPath: e.OUTPUT_CSV_PATH,
    denylist: e.SEARCH_DENYLIST.split(",")
      .map((d) => d.trim().toLowerCase())
      .filter(Boolean),
    searchRetries: e.SEARCH_RETRIES,
    searchBackoffMs: e.SEARCH_BACKOFF_MS,
    rowDelayMs: e.ROW_DELAY_MS,
    fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
    userAgent: e.USER_AGENT,
    districtPolicy: e.DISTRICT_POLICY,
    addressPolicy: e.ADDRESS_POLICY,
  };
}
