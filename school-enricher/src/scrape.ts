import _ from "lodash";
import { extractInfo, type Extraction } from "./extract";
import type { PageFetcher } from "./http";
import { logger } from "./logger";
import { emptyPageInfo, mergePageInfo } from "./merge";
import { parsePage } from "./parse";
import type { AddressPolicy, DistrictPolicy, PageInfo } from "./types";
import { describeError } from "./utils";

export const SUBPAGE_KEYWORDS = ["contact", "about", "reach-us", "address"];

export type ScrapeOptions = {
  districtPolicy?: DistrictPolicy;
  addressPolicy?: AddressPolicy;
};

export function isSubpageLink(href: string): boolean {
  const h = href.toLowerCase();
  return SUBPAGE_KEYWORDS.some((k) => h.includes(k));
}

export function resolveLink(href: string, baseUrl: string): string | null {
  try {
    const abs = new URL(href.startsWith("http") ? href : new URL(href, baseUrl).toString());
    if (abs.protocol !== "http:" && abs.protocol !== "https:") return null;
    abs.hash = "";
    return abs.toString();
  } catch {
    return null;
  }
}

export function normalizeAddress(addr: string): string {
  return addr
    .replace(/\s*\|\s*/g, ", ")
    .replace(/\s+/g, " ")
    .trim();
}

export function mergeAddresses(candidates: string[], policy: AddressPolicy): string {
  if (policy === "single") return candidates.find(Boolean) ?? "";
  return _.uniq(candidates.map(normalizeAddress).filter(Boolean)).join(" | ");
}

/**
 * Scrapes one candidate website plus its contact/about subpages into a single
 * PageInfo. Never throws: a failed fetch yields empty fields.
 */
export async function scrapePage(
  fetcher: PageFetcher,
  url: string,
  regionHint: string,
  opts: ScrapeOptions = {}
): Promise<PageInfo> {
  const districtPolicy = opts.districtPolicy ?? "rich";
  const addressPolicy = opts.addressPolicy ?? "merged";

  const info = emptyPageInfo();
  const addresses: string[] = [];

  const absorb = (extraction: Extraction) => {
    mergePageInfo(info, extraction.info, ["District", "Tel", "Email"]);
    if (addressPolicy === "merged") addresses.push(...extraction.addressCandidates);
    else if (extraction.info.Address) addresses.push(extraction.info.Address);
  };

  let html: string;
  try {
    html = await fetcher.getHtml(url);
  } catch (err) {
    logger.warn(`Request failed for ${url}: ${describeError(err)}`);
    return info;
  }

  try {
    const page = parsePage(html);
    if (page.locationHint) addresses.push(page.locationHint);
    absorb(extractInfo(page.text, regionHint, districtPolicy));

    const visited = new Set<string>([url]);
    for (const href of page.links) {
      if (!isSubpageLink(href)) continue;
      const target = resolveLink(href, url);
      if (!target || visited.has(target)) continue;
      visited.add(target);

      try {
        const sub = parsePage(await fetcher.getHtml(target));
        absorb(extractInfo(sub.text, regionHint, districtPolicy));
      } catch (err) {
        logger.debug(`Skipping subpage ${target}: ${describeError(err)}`);
      }
    }
  } catch (err) {
    logger.warn(`Failed to scrape ${url}: ${describeError(err)}`);
  }

  info.Address = mergeAddresses(addresses, addressPolicy);
  return info;
}
