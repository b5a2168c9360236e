import _ from "lodash";
import { findPhoneNumbersInText, type CountryCode } from "libphonenumber-js/max";
import { emptyPageInfo } from "./merge";
import type { DistrictPolicy, PageInfo } from "./types";
import { titleCase } from "./utils";

export const PHONE_REGION: CountryCode = "IN";

const EMAIL_RE = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z|a-z]{2,}\b/g;
const SOCIAL_EMAIL_DOMAINS = ["facebook.com", "twitter.com"];

const DISTRICT_LINE_RE = /\b(district|dist|dt\.?)\b/i;
const DISTRICT_BOILERPLATE_RE = /district[:\s-]*|opening of the new|reg|government of|india/gi;
const DISTRICT_WORD_RE = /district[:\s-]*/gi;

export type Extraction = {
  info: PageInfo;
  // every line that looks like an address, in page order
  addressCandidates: string[];
};

type DistrictStrategy = (lines: string[], addressCandidates: string[], regionHint: string) => string;

export function extractEmail(text: string): string {
  const matches = text.match(EMAIL_RE) ?? [];
  const hit = matches.find((e) => !SOCIAL_EMAIL_DOMAINS.some((d) => e.toLowerCase().includes(d)));
  return hit ?? "";
}

export function extractPhone(text: string, region: CountryCode = PHONE_REGION): string {
  for (const fragment of text.split(/[/,]/)) {
    const [found] = findPhoneNumbersInText(fragment, region);
    if (found) return found.number.formatInternational();
  }
  return "";
}

export function toLines(text: string): string[] {
  return text
    .split("\n")
    .map((l) => l.trim())
    .filter(Boolean);
}

export function findAddressLines(lines: string[], regionHint: string): string[] {
  if (!regionHint) return [];
  const re = new RegExp(`\\d{1,4}.*(${_.escapeRegExp(regionHint)})`, "i");
  return lines.filter((line) => re.test(line));
}

/** First short line mentioning "district", with the word itself removed. */
export const simpleDistrict: DistrictStrategy = (lines) => {
  const line = lines.find((l) => l.toLowerCase().includes("district") && l.length < 100);
  if (!line) return "";
  return titleCase(line.replace(DISTRICT_WORD_RE, "").trim());
};

/**
 * First line carrying a district marker, stripped of government boilerplate;
 * the last comma segment is the district. Without such a line, the segment
 * just before the region in the first address line is used instead.
 */
export const richDistrict: DistrictStrategy = (lines, addressCandidates, regionHint) => {
  const line = lines.find((l) => DISTRICT_LINE_RE.test(l));
  if (line) {
    const parts = line
      .replace(DISTRICT_BOILERPLATE_RE, "")
      .split(",")
      .map((p) => p.trim())
      .filter(Boolean);
    return parts.length ? titleCase(parts[parts.length - 1]) : "";
  }

  const [addressLine] = addressCandidates;
  if (!addressLine || !regionHint) return "";

  const m = addressLine.match(new RegExp(`(.+?),?\\s*${_.escapeRegExp(regionHint)}`, "i"));
  if (!m) return "";
  const segments = m[1].split(",");
  return titleCase(segments[segments.length - 1].trim());
};

export const DISTRICT_STRATEGIES: Record<DistrictPolicy, DistrictStrategy> = {
  simple: simpleDistrict,
  rich: richDistrict,
};

export function extractInfo(
  text: string,
  regionHint: string,
  districtPolicy: DistrictPolicy = "rich"
): Extraction {
  const info = emptyPageInfo();
  info.Email = extractEmail(text);
  info.Tel = extractPhone(text);

  const lines = toLines(text);
  const addressCandidates = findAddressLines(lines, regionHint);
  info.Address = addressCandidates[0] ?? "";
  info.District = DISTRICT_STRATEGIES[districtPolicy](lines, addressCandidates, regionHint);

  return { info, addressCandidates };
}
