import { load, type CheerioAPI } from "cheerio";
import { hasChildren, isText, type AnyNode } from "domhandler";

export type ParsedPage = {
  text: string;
  locationHint: string;
  links: string[];
};

function collectText(nodes: AnyNode[], out: string[]): string[] {
  for (const node of nodes) {
    if (isText(node)) {
      const t = node.data.trim();
      if (t) out.push(t);
    } else if (hasChildren(node)) {
      collectText(node.children, out);
    }
  }
  return out;
}

/** Text of a `p.loc-icon` element, its text nodes joined with ", ". */
export function pickLocationHint($: CheerioAPI): string {
  const el = $("p.loc-icon").first();
  if (!el.length) return "";
  return collectText(el.toArray(), []).join(", ");
}

/** Visible text, one text node per line. */
export function visibleText($: CheerioAPI): string {
  $("script,noscript,style,template").remove();
  return collectText($.root().toArray(), []).join("\n");
}

export function pickLinks($: CheerioAPI): string[] {
  const links: string[] = [];
  $("a[href]").each((_, a) => {
    const href = ($(a).attr("href") ?? "").trim();
    if (href) links.push(href);
  });
  return links;
}

export function parsePage(html: string): ParsedPage {
  const $ = load(html);
  const locationHint = pickLocationHint($);
  const links = pickLinks($);
  return { locationHint, links, text: visibleText($) };
}
