import { Logger } from "@listing-tracker/shared-utils";
import { MemoryListingStore } from "../src/adapters/repo.memory";
import { DateKey, Listing, ListingDetails, RawRecord } from "../src/core/dto";
import { Clock, ListingTx } from "../src/core/ports";

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Clock that starts at `start` and advances `stepMs` on every reading
 */
export function steppingClock(start: string, stepMs = 1000): Clock {
  let t = new Date(start).getTime();
  return () => {
    const now = new Date(t);
    t += stepMs;
    return now;
  };
}

export function record(propertyCode: string, price: number): RawRecord {
  return { propertyCode, price, propertyType: "flat", operation: "sale" };
}

export function activeListing(
  propertyCode: string,
  lastSeenAt: string,
  overrides: Partial<Listing> = {}
): Listing {
  return {
    propertyCode,
    firstSeenAt: new Date(lastSeenAt),
    lastSeenAt: new Date(lastSeenAt),
    publicationDate: null,
    isActive: true,
    soldOrWithdrawnAt: null,
    republished: false,
    republishedAt: null,
    ...overrides,
  };
}

export function detailsFor(propertyCode: string, price: number): ListingDetails {
  return {
    propertyCode,
    price,
    previousPrices: {},
    allFields: record(propertyCode, price),
  };
}

/**
 * Transaction whose inserts fail for the given property codes
 */
class FailingTx implements ListingTx {
  constructor(private inner: ListingTx, private failOn: Set<string>) {}

  getListing(propertyCode: string): Promise<Listing | null> {
    return this.inner.getListing(propertyCode);
  }

  getDetails(propertyCode: string): Promise<ListingDetails | null> {
    return this.inner.getDetails(propertyCode);
  }

  async insertListing(listing: Listing): Promise<void> {
    if (this.failOn.has(listing.propertyCode)) {
      throw new Error(`Insert failed for ${listing.propertyCode}`);
    }
    await this.inner.insertListing(listing);
  }

  insertDetails(details: ListingDetails): Promise<void> {
    return this.inner.insertDetails(details);
  }

  updateListing(listing: Listing): Promise<void> {
    return this.inner.updateListing(listing);
  }

  updateDetails(details: ListingDetails): Promise<void> {
    return this.inner.updateDetails(details);
  }

  deactivateUnseen(before: Date, on: DateKey): Promise<number> {
    return this.inner.deactivateUnseen(before, on);
  }

  commit(): Promise<void> {
    return this.inner.commit();
  }

  rollback(): Promise<void> {
    return this.inner.rollback();
  }
}

export class FailingStore extends MemoryListingStore {
  readonly failOn = new Set<string>();

  async begin(): Promise<ListingTx> {
    return new FailingTx(await super.begin(), this.failOn);
  }
}
