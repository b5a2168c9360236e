import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CheckpointStore } from "./checkpoint";
import { Enricher, type EnricherDeps } from "./enrich";
import { emptyPageInfo } from "./merge";
import type { PageInfo, RosterRow } from "./types";

const roster = (n: number): RosterRow[] =>
  Array.from({ length: n }, (_, i) => ({ School: `School ${i}`, "State/UT": "Delhi" }));

const info = (fields: Partial<PageInfo>): PageInfo => ({ ...emptyPageInfo(), ...fields });

describe("Enricher", () => {
  let dir: string;
  let path: string;
  let store: CheckpointStore;
  let search: Mock<EnricherDeps["search"]>;
  let scrape: Mock<EnricherDeps["scrape"]>;
  let pause: Mock<(ms: number) => Promise<void>>;

  const enricher = (rowDelayMs = 0) => new Enricher({ search, scrape, store, sleep: pause }, { rowDelayMs });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "enrich-"));
    path = join(dir, "schools.json");
    store = new CheckpointStore(path);
    search = vi.fn<EnricherDeps["search"]>(async () => []);
    scrape = vi.fn<EnricherDeps["scrape"]>(async () => emptyPageInfo());
    pause = vi.fn(async (_ms: number) => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("merges fields across sites without overwriting earlier finds", async () => {
    search.mockResolvedValue(["https://a.example", "https://b.example"]);
    scrape.mockImplementation(async (url) =>
      url === "https://a.example"
        ? info({ Email: "office@a.example" })
        : info({ Email: "office@b.example", Tel: "+91 81234 56789", Address: "12 Ring Road, Delhi" })
    );

    const outcome = await enricher().processRow({ School: "Sunrise School", "State/UT": "Delhi", Board: "CBSE" }, 0, 1);

    expect(outcome).toBe("enriched");
    expect(store.all()).toEqual([
      {
        School: "Sunrise School",
        "State/UT": "Delhi",
        Board: "CBSE",
        Website: "https://a.example",
        District: "",
        Address: "12 Ring Road, Delhi",
        Tel: "+91 81234 56789",
        Email: "office@a.example",
      },
    ]);
    expect(scrape.mock.calls).toEqual([
      ["https://a.example", "Delhi"],
      ["https://b.example", "Delhi"],
    ]);
  });

  it("records rows without a website with empty fields", async () => {
    const outcome = await enricher().processRow({ School: "Hill View", "State/UT": "Kerala" }, 0, 1);

    expect(outcome).toBe("no_website");
    expect(store.all()).toEqual([
      { School: "Hill View", "State/UT": "Kerala", Website: "", District: "", Address: "", Tel: "", Email: "" },
    ]);
    expect(scrape).not.toHaveBeenCalled();
  });

  it("passes cleaned school and region values to search", async () => {
    await enricher().processRow({ School: " Sunrise\r\nSchool ", "State/UT": "Delhi\n" }, 0, 1);

    expect(search).toHaveBeenCalledWith("Sunrise School", "Delhi");
  });

  it("saves after every row and pauses only for processed rows", async () => {
    const rows = [...roster(2), { School: "school 0", "State/UT": " delhi" }];

    const summary = await enricher(250).run(rows);

    expect(summary).toEqual({
      resumedFrom: 0,
      processed: 2,
      skipped: 1,
      failed: 0,
      totalRecords: 2,
      interrupted: false,
    });
    expect(pause.mock.calls).toEqual([[250], [250]]);

    const reloaded = new CheckpointStore(path);
    expect(await reloaded.load()).toBe(2);
  });

  it("resumes after the rows already in the checkpoint", async () => {
    await enricher().run(roster(2));
    search.mockClear();

    const resumed = new CheckpointStore(path);
    await resumed.load();
    const summary = await new Enricher({ search, scrape, store: resumed, sleep: pause }, { rowDelayMs: 0 }).run(
      roster(5)
    );

    expect(search.mock.calls.map(([school]) => school)).toEqual(["School 2", "School 3", "School 4"]);
    expect(summary.resumedFrom).toBe(2);
    expect(summary.totalRecords).toBe(5);
  });

  it("does nothing on a rerun over a finished roster", async () => {
    await enricher().run(roster(3));
    search.mockClear();

    const summary = await enricher().run(roster(3));

    expect(search).not.toHaveBeenCalled();
    expect(summary.processed).toBe(0);
    expect(summary.totalRecords).toBe(3);
  });

  it("skips by identity when the checkpoint holds rows out of order", async () => {
    store.append({ ...roster(5)[4], Website: "", ...emptyPageInfo() });

    const summary = await enricher().run(roster(5));

    expect(search.mock.calls.map(([school]) => school)).toEqual(["School 1", "School 2", "School 3"]);
    expect(summary).toMatchObject({ resumedFrom: 1, processed: 3, skipped: 1, totalRecords: 4 });
  });

  it("logs a failing row and carries on", async () => {
    search.mockImplementation(async (school) => {
      if (school === "School 2") throw new Error("boom");
      return [];
    });

    const summary = await enricher().run(roster(10));

    expect(summary.failed).toBe(1);
    expect(summary.processed).toBe(9);
    expect(store.size).toBe(9);
    expect(store.has("School 2", "Delhi")).toBe(false);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("Error processing row 2: boom"));
  });

  it("stops at the next row once aborted", async () => {
    const controller = new AbortController();
    search.mockImplementation(async (school) => {
      if (school === "School 1") controller.abort();
      return [];
    });

    const summary = await enricher().run(roster(5), controller.signal);

    expect(summary.interrupted).toBe(true);
    expect(summary.processed).toBe(2);
    expect(store.size).toBe(2);
  });
});
