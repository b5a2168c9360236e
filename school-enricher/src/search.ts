import type { AxiosInstance } from "axios";
import { z } from "zod";
import { SERPER_ENDPOINT } from "./config";
import { logger } from "./logger";
import type { OrganicResult } from "./types";
import { collapseWhitespace, describeError, sleep } from "./utils";

export const MAX_WEBSITES = 5;

const OrganicResultSchema = z
  .object({
    title: z.string().optional(),
    link: z.string().optional(),
    snippet: z.string().optional(),
    position: z.number().optional(),
  })
  .passthrough();

// Malformed entries are dropped one by one; the rest of the page is kept
export function parseOrganic(body: unknown): OrganicResult[] {
  const organic = z.object({ organic: z.array(z.unknown()) }).safeParse(body);
  if (!organic.success) return [];

  const results: OrganicResult[] = [];
  for (const item of organic.data.organic) {
    const parsed = OrganicResultSchema.safeParse(item);
    if (parsed.success) results.push(parsed.data);
  }
  return results;
}

export interface SearchClient {
  search(query: string): Promise<OrganicResult[]>;
}

export class SerperClient implements SearchClient {
  constructor(
    private readonly http: AxiosInstance,
    private readonly apiKey: string,
    private readonly endpoint: string = SERPER_ENDPOINT
  ) {}

  async search(query: string): Promise<OrganicResult[]> {
    const { data } = await this.http.post<unknown>(
      this.endpoint,
      { q: query },
      {
        headers: {
          "X-API-KEY": this.apiKey,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
      }
    );
    return parseOrganic(data);
  }
}

export type SearchOptions = {
  retries?: number;
  backoffMs?: number;
  denylist?: string[];
};

export function buildQuery(schoolName: string, region: string): string {
  return `${collapseWhitespace(schoolName)} ${collapseWhitespace(region)} official website`;
}

export function filterLinks(results: OrganicResult[], denylist: string[], limit = MAX_WEBSITES): string[] {
  const links: string[] = [];
  for (const item of results) {
    const link = item.link ?? "";
    const lower = link.toLowerCase();
    if (
      link &&
      !denylist.some((bad) => lower.includes(bad)) &&
      (link.startsWith("http://") || link.startsWith("https://"))
    ) {
      links.push(link);
    }
    if (links.length === limit) break;
  }
  return links;
}

/**
 * Ranked candidate websites for one school. Failed or empty attempts are
 * retried after a fixed backoff; exhausting every attempt yields [].
 */
export async function searchSchoolWebsites(
  client: SearchClient,
  schoolName: string,
  region: string,
  opts: SearchOptions = {}
): Promise<string[]> {
  const retries = opts.retries ?? 5;
  const backoffMs = opts.backoffMs ?? 2000;
  const denylist = opts.denylist ?? ["indiastudychannel.com"];

  const name = collapseWhitespace(schoolName);
  const query = buildQuery(schoolName, region);

  for (let attempt = 1; attempt <= retries; attempt++) {
    try {
      const websites = filterLinks(await client.search(query), denylist);
      if (websites.length) {
        logger.info(`Top ${websites.length} sites for ${name}: ${websites.join(", ")}`);
        return websites;
      }
      logger.info(`Search attempt ${attempt} for ${name} returned no usable links`);
    } catch (err) {
      logger.warn(`Search attempt ${attempt} failed for ${name}: ${describeError(err)}`);
    }

    if (attempt < retries) await sleep(backoffMs);
  }

  logger.warn(`No websites found for ${name}`);
  return [];
}
