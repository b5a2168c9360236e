export type RosterRow = Record<string, string>;

export type PageInfo = {
  District: string;
  Address: string;
  Tel: string;
  Email: string;
};

export type PageField = keyof PageInfo;

export type EnrichedRecord = RosterRow & PageInfo & {
  Website: string;
};

export type DistrictPolicy = "simple" | "rich";

// single: first address found wins; merged: every candidate joined with " | "
export type AddressPolicy = "single" | "merged";

export type OrganicResult = {
  title?: string;
  link?: string;
  snippet?: string;
  position?: number;
};

export type RowOutcome = "skipped" | "no_website" | "enriched";

export type RunSummary = {
  resumedFrom: number;
  processed: number;
  skipped: number;
  failed: number;
  totalRecords: number;
  interrupted: boolean;
};
