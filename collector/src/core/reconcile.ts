import { Logger } from "@listing-tracker/shared-utils";
import {
  Listing,
  ListingDetails,
  RawRecord,
  ReconcileInput,
  ReconcileResult,
} from "./dto";
import { ListingTx } from "./ports";
import { extractRecord } from "./record";
import { toDateKey } from "./utils";

/**
 * Classify one observation of a listing against stored state and apply it.
 *
 * Rules are checked in order and the first match wins:
 *
 * 1. `new`: nothing stored for the code yet
 * 2. `price_change`: stored price differs; the old price is recorded under
 *    today's date (`now`), flags are left alone even when inactive
 * 3. `republished`: price unchanged and the listing is inactive
 * 4. `active`: anything else; only `lastSeenAt` advances
 *
 * Writes go to `tx` and are never committed here. Storage errors propagate.
 */
export async function reconcile(
  tx: ListingTx,
  input: ReconcileInput,
  now: Date,
  logger?: Logger
): Promise<ReconcileResult> {
  const { propertyCode, price, allFields } = input;

  if (!propertyCode || !price) {
    logger?.warn("Invalid property data, skipping", { propertyCode, price });
    return { action: "skipped" };
  }

  const existing = await tx.getListing(propertyCode);

  if (!existing) {
    const listing: Listing = {
      propertyCode,
      firstSeenAt: now,
      lastSeenAt: now,
      publicationDate: input.publicationDate ?? null,
      isActive: true,
      soldOrWithdrawnAt: null,
      republished: false,
      republishedAt: null,
    };
    const details: ListingDetails = {
      propertyCode,
      price,
      previousPrices: {},
      allFields,
    };

    await tx.insertListing(listing);
    await tx.insertDetails(details);

    logger?.info(`New listing ${propertyCode}`, { price });
    return { action: "new", listing, details };
  }

  const existingDetails = await tx.getDetails(propertyCode);

  if (existingDetails && existingDetails.price !== price) {
    const details: ListingDetails = {
      ...existingDetails,
      price,
      previousPrices: {
        ...existingDetails.previousPrices,
        [toDateKey(now)]: existingDetails.price,
      },
      allFields,
    };
    const listing: Listing = { ...existing, lastSeenAt: now };

    await tx.updateDetails(details);
    await tx.updateListing(listing);

    logger?.info(`Price change for ${propertyCode}`, {
      oldPrice: existingDetails.price,
      newPrice: price,
    });
    return { action: "price_change", listing, details };
  }

  const details: ListingDetails | null = existingDetails
    ? { ...existingDetails, allFields }
    : null;

  if (!existing.isActive) {
    const listing: Listing = {
      ...existing,
      isActive: true,
      soldOrWithdrawnAt: null,
      republished: true,
      republishedAt: now,
      lastSeenAt: now,
    };

    await tx.updateListing(listing);
    if (details) {
      await tx.updateDetails(details);
    }

    logger?.info(`Listing ${propertyCode} republished`);
    return { action: "republished", listing, details };
  }

  const listing: Listing = { ...existing, lastSeenAt: now };

  await tx.updateListing(listing);
  if (details) {
    await tx.updateDetails(details);
  }

  return { action: "active", listing, details };
}

/**
 * Reconcile a raw search record, skipping it when it carries no usable
 * code or price.
 */
export async function reconcileRecord(
  tx: ListingTx,
  raw: RawRecord,
  now: Date,
  logger?: Logger
): Promise<ReconcileResult> {
  const extracted = extractRecord(raw);

  if (!extracted) {
    logger?.warn("Invalid property data, skipping", {
      propertyCode: raw.propertyCode,
      price: raw.price,
    });
    return { action: "skipped" };
  }

  return reconcile(
    tx,
    {
      propertyCode: extracted.propertyCode,
      price: extracted.price,
      allFields: raw,
    },
    now,
    logger
  );
}
