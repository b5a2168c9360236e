import { describe, it, expect } from "vitest";
import { ConfigError, DEFAULT_USER_AGENT, SERPER_ENDPOINT, loadConfig } from "./config";

describe("loadConfig", () => {
  it("requires an API key", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ SERPER_API_KEY: "   " })).toThrow("SERPER_API_KEY is required");
  });

  it("fills defaults", () => {
    expect(loadConfig({ SERPER_API_KEY: "test-secret" })).toEqual({
      apiKey: "test-secret",
      searchEndpoint: SERPER_ENDPOINT,
      inputPath: "data/in/schools.csv",
      outputJsonPath: "data/out/schools_enriched.json",
      outputCsvPath: "data/out/schools_enriched.csv",
      denylist: ["indiastudychannel.com"],
      searchRetries: 5,
      searchBackoffMs: 2000,
      rowDelayMs: 1000,
      fetchTimeoutMs: 15000,
      userAgent: DEFAULT_USER_AGENT,
      districtPolicy: "rich",
      addressPolicy: "merged",
    });
  });

  it("coerces numbers and splits the denylist", () => {
    const config = loadConfig({
      SERPER_API_KEY: "test-secret",
      SEARCH_RETRIES: "3",
      ROW_DELAY_MS: "0",
      SEARCH_DENYLIST: "A.com, b.org ,",
      DISTRICT_POLICY: "simple",
      ADDRESS_POLICY: "single",
    });

    expect(config.searchRetries).toBe(3);
    expect(config.rowDelayMs).toBe(0);
    expect(config.denylist).toEqual(["a.com", "b.org"]);
    expect(config.districtPolicy).toBe("simple");
    expect(config.addressPolicy).toBe("single");
  });

  it("rejects unknown policies and bad numbers", () => {
    expect(() => loadConfig({ SERPER_API_KEY: "test-secret", DISTRICT_POLICY: "fuzzy" })).toThrow(ConfigError);
    expect(() => loadConfig({ SERPER_API_KEY: "test-secret", SEARCH_RETRIES: "0" })).toThrow(/SEARCH_RETRIES/);
  });
});
