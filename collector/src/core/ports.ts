import {
  ApiRequestRecord,
  DatabaseStats,
  DateKey,
  JobType,
  Listing,
  ListingDetails,
  ScanSummary,
  SearchPage,
  SearchQuery,
} from "./dto";

// Paginated search API (HTTP or fixtures)
export interface SourcePort {
  search(query: SearchQuery): Promise<SearchPage>;
}

/**
 * One unit of work against the listing store. Reads see the transaction's
 * own writes; nothing is visible to other transactions until `commit`.
 */
export interface ListingTx {
  getListing(propertyCode: string): Promise<Listing | null>;
  getDetails(propertyCode: string): Promise<ListingDetails | null>;
  insertListing(listing: Listing): Promise<void>;
  insertDetails(details: ListingDetails): Promise<void>;
  updateListing(listing: Listing): Promise<void>;
  updateDetails(details: ListingDetails): Promise<void>;
  /**
   * Bulk-deactivate active listings last seen before `before`.
   * Returns the number of rows affected.
   */
  deactivateUnseen(before: Date, on: DateKey): Promise<number>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

// Persistence for listings and the API request ledger
export interface ListingStorePort {
  healthCheck(): Promise<boolean>;
  begin(): Promise<ListingTx>;
  getStatistics(): Promise<DatabaseStats>;
  close(): Promise<void>;
}

// Where the HTTP client records outbound calls
export interface ApiLedgerPort {
  recordApiRequest(request: ApiRequestRecord): Promise<void>;
}

// Durable storage for raw pages and job metadata
export interface ArchivePort {
  archivePage(
    jobType: JobType,
    dateKey: DateKey,
    page: number,
    payload: unknown
  ): Promise<string>;
  archiveMetadata(
    jobType: JobType,
    dateKey: DateKey,
    metadata: unknown
  ): Promise<string>;
}

export interface ReporterPort {
  report(summary: ScanSummary): Promise<void>;
  reportFailure(jobId: string, jobType: JobType, error: unknown): Promise<void>;
}

export type Clock = () => Date;
