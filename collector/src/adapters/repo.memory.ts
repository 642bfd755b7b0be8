import {
  ApiRequestRecord,
  DatabaseStats,
  DateKey,
  Listing,
  ListingDetails,
} from "../core/dto";
import { ApiLedgerPort, ListingStorePort, ListingTx } from "../core/ports";

function cloneListing(listing: Listing): Listing {
  return {
    ...listing,
    firstSeenAt: new Date(listing.firstSeenAt),
    lastSeenAt: new Date(listing.lastSeenAt),
    republishedAt: listing.republishedAt
      ? new Date(listing.republishedAt)
      : null,
  };
}

function cloneDetails(details: ListingDetails): ListingDetails {
  return {
    ...details,
    previousPrices: { ...details.previousPrices },
    allFields: { ...details.allFields },
  };
}

/**
 * Transaction over a private copy of the store's maps. Commit swaps the copy
 * in; rollback drops it.
 */
class MemoryListingTx implements ListingTx {
  private closed = false;

  constructor(
    private store: MemoryListingStore,
    private listings: Map<string, Listing>,
    private details: Map<string, ListingDetails>
  ) {}

  async getListing(propertyCode: string): Promise<Listing | null> {
    this.ensureOpen();
    const listing = this.listings.get(propertyCode);
    return listing ? cloneListing(listing) : null;
  }

  async getDetails(propertyCode: string): Promise<ListingDetails | null> {
    this.ensureOpen();
    const details = this.details.get(propertyCode);
    return details ? cloneDetails(details) : null;
  }

  async insertListing(listing: Listing): Promise<void> {
    this.ensureOpen();
    if (this.listings.has(listing.propertyCode)) {
      throw new Error(`Listing ${listing.propertyCode} already exists`);
    }
    this.listings.set(listing.propertyCode, cloneListing(listing));
  }

  async insertDetails(details: ListingDetails): Promise<void> {
    this.ensureOpen();
    if (!this.listings.has(details.propertyCode)) {
      throw new Error(`No listing ${details.propertyCode} for details`);
    }
    if (this.details.has(details.propertyCode)) {
      throw new Error(`Details for ${details.propertyCode} already exist`);
    }
    this.details.set(details.propertyCode, cloneDetails(details));
  }

  async updateListing(listing: Listing): Promise<void> {
    this.ensureOpen();
    if (!this.listings.has(listing.propertyCode)) {
      throw new Error(`Listing ${listing.propertyCode} not found`);
    }
    this.listings.set(listing.propertyCode, cloneListing(listing));
  }

  async updateDetails(details: ListingDetails): Promise<void> {
    this.ensureOpen();
    if (!this.details.has(details.propertyCode)) {
      throw new Error(`Details for ${details.propertyCode} not found`);
    }
    this.details.set(details.propertyCode, cloneDetails(details));
  }

  async deactivateUnseen(before: Date, on: DateKey): Promise<number> {
    this.ensureOpen();
    let count = 0;
    for (const [code, listing] of this.listings) {
      if (listing.isActive && listing.lastSeenAt < before) {
        this.listings.set(code, {
          ...listing,
          isActive: false,
          soldOrWithdrawnAt: on,
        });
        count++;
      }
    }
    return count;
  }

  async commit(): Promise<void> {
    this.ensureOpen();
    this.closed = true;
    this.store.applyCommit(this.listings, this.details);
  }

  async rollback(): Promise<void> {
    this.ensureOpen();
    this.closed = true;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new Error("Transaction already closed");
    }
  }
}

export class MemoryListingStore implements ListingStorePort, ApiLedgerPort {
  private listings = new Map<string, Listing>();
  private details = new Map<string, ListingDetails>();
  private apiRequests: (ApiRequestRecord & { createdAt: Date })[] = [];
  private healthy = true;

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }

  async begin(): Promise<ListingTx> {
    return new MemoryListingTx(
      this,
      new Map(this.listings),
      new Map(this.details)
    );
  }

  /** @internal called by a committing transaction */
  applyCommit(
    listings: Map<string, Listing>,
    details: Map<string, ListingDetails>
  ): void {
    this.listings = listings;
    this.details = details;
  }

  async getStatistics(): Promise<DatabaseStats> {
    const all = Array.from(this.listings.values());
    return {
      totalListings: all.length,
      activeListings: all.filter((l) => l.isActive).length,
      inactiveListings: all.filter((l) => !l.isActive).length,
      republishedListings: all.filter((l) => l.republished).length,
    };
  }

  async recordApiRequest(request: ApiRequestRecord): Promise<void> {
    this.apiRequests.push({ ...request, createdAt: new Date() });
  }

  async close(): Promise<void> {}

  // Helper methods for testing and debugging

  setHealthy(healthy: boolean): void {
    this.healthy = healthy;
  }

  getListing(propertyCode: string): Listing | undefined {
    const listing = this.listings.get(propertyCode);
    return listing ? cloneListing(listing) : undefined;
  }

  getDetails(propertyCode: string): ListingDetails | undefined {
    const details = this.details.get(propertyCode);
    return details ? cloneDetails(details) : undefined;
  }

  getAllListings(): Listing[] {
    return Array.from(this.listings.values()).map(cloneListing);
  }

  getApiRequests(): (ApiRequestRecord & { createdAt: Date })[] {
    return [...this.apiRequests];
  }

  /** Store a listing (and optionally its details) as already committed */
  seed(listing: Listing, details?: ListingDetails): void {
    this.listings.set(listing.propertyCode, cloneListing(listing));
    if (details) {
      this.details.set(details.propertyCode, cloneDetails(details));
    }
  }

  clear(): void {
    this.listings.clear();
    this.details.clear();
    this.apiRequests = [];
  }

  size(): number {
    return this.listings.size;
  }
}
