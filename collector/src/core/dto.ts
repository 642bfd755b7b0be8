export type ISO = string;
/** Calendar date, `YYYY-MM-DD` */
export type DateKey = string;
export type Price = number;

/** Raw listing record as returned by the search API; never inspected beyond code and price */
export type RawRecord = Record<string, unknown>;

export interface Listing {
  propertyCode: string;
  firstSeenAt: Date;
  lastSeenAt: Date;
  publicationDate: DateKey | null;
  isActive: boolean;
  soldOrWithdrawnAt: DateKey | null;
  republished: boolean;
  republishedAt: Date | null;
}

export interface ListingDetails {
  propertyCode: string;
  price: Price;
  /** Former prices keyed by the date the change was detected */
  previousPrices: Record<DateKey, Price>;
  allFields: RawRecord;
}

export type ReconcileAction =
  | "new"
  | "price_change"
  | "republished"
  | "active"
  | "skipped";

export const RECONCILE_ACTIONS: readonly ReconcileAction[] = [
  "new",
  "price_change",
  "republished",
  "active",
  "skipped",
];

export type ActionCounts = Record<ReconcileAction, number>;

export interface ReconcileInput {
  propertyCode: string;
  price: Price;
  allFields: RawRecord;
  publicationDate?: DateKey | null;
}

export type ReconcileResult =
  | { action: "skipped" }
  | {
      action: Exclude<ReconcileAction, "skipped">;
      listing: Listing;
      details: ListingDetails | null;
    };

export type Operation = "sale" | "rent";
export type SortDirection = "asc" | "desc";
export type OrderField = "publicationDate" | "price" | "modificationDate";

export interface SearchQuery {
  operation: Operation;
  propertyType: string;
  locationId: string;
  /** Recency filter understood by the API, e.g. "Y" for the last two days */
  sinceDate?: string;
  pageSize: number;
  page: number;
  order: OrderField;
  sort: SortDirection;
}

export interface SearchPage {
  total: number;
  totalPages: number;
  items: RawRecord[];
  /** Response body as received, archived verbatim */
  raw: RawRecord;
}

export type JobType = "daily_new_listings" | "weekly_full_scan";

export interface DatabaseStats {
  totalListings: number;
  activeListings: number;
  inactiveListings: number;
  republishedListings: number;
}

export interface ScanSummary {
  jobId: string;
  jobType: JobType;
  startTime: ISO;
  endTime: ISO;
  durationSeconds: number;
  totalPages: number;
  totalProperties: number;
  actionCounts: ActionCounts;
  deactivatedCount?: number;
  scanStartTimestamp?: ISO;
  databaseStats: DatabaseStats;
}

export interface ApiRequestRecord {
  requestType: "oauth_token" | "search";
  endpoint: string;
  statusCode?: number;
  durationMs?: number;
  requestParams?: Record<string, string | number>;
  errorMessage?: string;
  jobId?: string;
}
