import axios from "axios";

export function collapseWhitespace(s: string): string {
  return s.split(/\s+/).filter(Boolean).join(" ");
}

/**
 * Upper-cases the first letter of every run of letters and lower-cases the rest,
 * so "NORTH delhi" becomes "North Delhi".
 */
export function titleCase(s: string): string {
  return s.toLowerCase().replace(/\p{L}+/gu, (w) => w.charAt(0).toUpperCase() + w.slice(1));
}

export function identityKey(school: string, region: string): string {
  return `${collapseWhitespace(school).toLowerCase()}|${collapseWhitespace(region).toLowerCase()}`;
}

export function describeError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    return status ? `HTTP ${status}` : err.code ?? err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

export async function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}
