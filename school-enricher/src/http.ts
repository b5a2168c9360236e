import axios, { type AxiosInstance } from "axios";
import { DEFAULT_USER_AGENT } from "./config";

export type HttpOptions = {
  userAgent?: string;
  timeoutMs?: number;
};

export interface PageFetcher {
  getHtml(url: string): Promise<string>;
}

export function createHttp(opts: HttpOptions = {}): AxiosInstance {
  return axios.create({
    headers: {
      "User-Agent": opts.userAgent ?? DEFAULT_USER_AGENT,
      Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    },
    timeout: opts.timeoutMs ?? 15000,
  });
}

// Single attempt; any transport error or non-2xx status rejects.
export function createPageFetcher(http: AxiosInstance): PageFetcher {
  return {
    async getHtml(url: string): Promise<string> {
      const res = await http.get<string>(url, { responseType: "text" });
      return typeof res.data === "string" ? res.data : "";
    },
  };
}
