import type { PageField, PageInfo } from "./types";

export const PAGE_FIELDS: readonly PageField[] = ["District", "Address", "Tel", "Email"];

export function emptyPageInfo(): PageInfo {
  return { District: "", Address: "", Tel: "", Email: "" };
}

/** Fills the empty fields of `target` from `source`; set fields are never overwritten. */
export function mergePageInfo(
  target: PageInfo,
  source: PageInfo,
  fields: readonly PageField[] = PAGE_FIELDS
): PageInfo {
  for (const key of fields) {
    if (!target[key] && source[key]) target[key] = source[key];
  }
  return target;
}
