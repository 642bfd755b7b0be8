import { beforeEach, describe, expect, it } from "vitest";
import { MemoryListingStore } from "../src/adapters/repo.memory";
import { ReconcileInput, ReconcileResult } from "../src/core/dto";
import { reconcile, reconcileRecord } from "../src/core/reconcile";
import { activeListing, detailsFor, record } from "./helpers";

const DAY1 = new Date("2024-03-10T08:00:00Z");
const DAY1_LATER = new Date("2024-03-10T17:30:00Z");
const DAY2 = new Date("2024-03-11T08:00:00Z");

function input(propertyCode: string, price: number): ReconcileInput {
  return { propertyCode, price, allFields: record(propertyCode, price) };
}

describe("reconcile", () => {
  let store: MemoryListingStore;

  async function apply(
    value: ReconcileInput,
    now: Date
  ): Promise<ReconcileResult> {
    const tx = await store.begin();
    const result = await reconcile(tx, value, now);
    await tx.commit();
    return result;
  }

  beforeEach(() => {
    store = new MemoryListingStore();
  });

  describe("new listings", () => {
    it("should create listing and details on first observation", async () => {
      const result = await apply(input("A1", 100), DAY1);

      expect(result.action).toBe("new");
      expect(store.getListing("A1")).toEqual({
        propertyCode: "A1",
        firstSeenAt: DAY1,
        lastSeenAt: DAY1,
        publicationDate: null,
        isActive: true,
        soldOrWithdrawnAt: null,
        republished: false,
        republishedAt: null,
      });
      expect(store.getDetails("A1")).toEqual({
        propertyCode: "A1",
        price: 100,
        previousPrices: {},
        allFields: record("A1", 100),
      });
    });

    it("should keep the publication date when given", async () => {
      await apply({ ...input("A1", 100), publicationDate: "2024-03-09" }, DAY1);

      expect(store.getListing("A1")?.publicationDate).toBe("2024-03-09");
    });
  });

  describe("skipped records", () => {
    it("should skip a zero price without writing", async () => {
      const result = await apply(input("A1", 0), DAY1);

      expect(result).toEqual({ action: "skipped" });
      expect(store.size()).toBe(0);
    });

    it("should skip an empty property code without writing", async () => {
      const result = await apply(input("", 100), DAY1);

      expect(result).toEqual({ action: "skipped" });
      expect(store.size()).toBe(0);
    });
  });

  describe("active listings", () => {
    it("should only advance lastSeenAt when nothing changed", async () => {
      await apply(input("A1", 100), DAY1);
      const result = await apply(input("A1", 100), DAY2);

      expect(result.action).toBe("active");
      const listing = store.getListing("A1");
      expect(listing?.firstSeenAt).toEqual(DAY1);
      expect(listing?.lastSeenAt).toEqual(DAY2);
      expect(listing?.isActive).toBe(true);
      expect(store.getDetails("A1")?.previousPrices).toEqual({});
    });

    it("should refresh the raw fields", async () => {
      await apply(input("A1", 100), DAY1);
      await apply(
        { ...input("A1", 100), allFields: { propertyCode: "A1", price: 100, rooms: 3 } },
        DAY2
      );

      expect(store.getDetails("A1")?.allFields).toEqual({
        propertyCode: "A1",
        price: 100,
        rooms: 3,
      });
    });

    it("should treat a listing without details as active", async () => {
      store.seed(activeListing("A1", "2024-03-01T00:00:00Z"));

      const result = await apply(input("A1", 100), DAY1);

      expect(result).toEqual({
        action: "active",
        listing: activeListing("A1", "2024-03-01T00:00:00Z", {
          lastSeenAt: DAY1,
        }),
        details: null,
      });
    });

    it("should be idempotent for repeated observations", async () => {
      const first = await apply(input("A1", 100), DAY1);
      const second = await apply(input("A1", 100), DAY1);

      expect(first.action).toBe("new");
      expect(second.action).toBe("active");
      expect(store.getListing("A1")).toMatchObject({
        firstSeenAt: DAY1,
        lastSeenAt: DAY1,
      });
      expect(store.getDetails("A1")).toMatchObject({
        price: 100,
        previousPrices: {},
      });
    });

    it("should see an unchanged fractional price as active", async () => {
      await apply(input("A1", 199999.995), DAY1);
      const result = await apply(input("A1", 199999.995), DAY2);

      expect(result.action).toBe("active");
      expect(store.getDetails("A1")).toMatchObject({
        price: 199999.995,
        previousPrices: {},
      });
    });
  });

  describe("price changes", () => {
    it("should record the old price under the detection date", async () => {
      await apply(input("A1", 100), DAY1);
      const result = await apply(input("A1", 90), DAY2);

      expect(result.action).toBe("price_change");
      expect(store.getDetails("A1")).toMatchObject({
        price: 90,
        previousPrices: { "2024-03-11": 100 },
      });
      expect(store.getListing("A1")?.lastSeenAt).toEqual(DAY2);
    });

    it("should keep history across days", async () => {
      await apply(input("A1", 100), DAY1);
      await apply(input("A1", 90), DAY1_LATER);
      await apply(input("A1", 80), DAY2);

      expect(store.getDetails("A1")?.previousPrices).toEqual({
        "2024-03-10": 100,
        "2024-03-11": 90,
      });
    });

    it("should overwrite the entry for a second change on the same day", async () => {
      await apply(input("A1", 100), DAY1);
      await apply(input("A1", 90), DAY2);
      await apply(
        input("A1", 80),
        new Date("2024-03-11T20:00:00Z")
      );

      expect(store.getDetails("A1")).toMatchObject({
        price: 80,
        previousPrices: { "2024-03-11": 90 },
      });
    });

    it("should leave an inactive listing inactive", async () => {
      store.seed(
        activeListing("A1", "2024-03-01T00:00:00Z", {
          isActive: false,
          soldOrWithdrawnAt: "2024-03-05",
        }),
        detailsFor("A1", 100)
      );

      const result = await apply(input("A1", 95), DAY1);

      expect(result.action).toBe("price_change");
      expect(store.getListing("A1")).toMatchObject({
        isActive: false,
        soldOrWithdrawnAt: "2024-03-05",
        republished: false,
        lastSeenAt: DAY1,
      });
    });
  });

  describe("republished listings", () => {
    it("should reactivate an inactive listing at the same price", async () => {
      store.seed(
        activeListing("A1", "2024-03-01T00:00:00Z", {
          isActive: false,
          soldOrWithdrawnAt: "2024-03-05",
        }),
        detailsFor("A1", 100)
      );

      const result = await apply(input("A1", 100), DAY1);

      expect(result.action).toBe("republished");
      expect(store.getListing("A1")).toEqual({
        propertyCode: "A1",
        firstSeenAt: new Date("2024-03-01T00:00:00Z"),
        lastSeenAt: DAY1,
        publicationDate: null,
        isActive: true,
        soldOrWithdrawnAt: null,
        republished: true,
        republishedAt: DAY1,
      });
      expect(store.getDetails("A1")?.previousPrices).toEqual({});
    });
  });

  describe("transactions", () => {
    it("should not persist anything until commit", async () => {
      const tx = await store.begin();
      await reconcile(tx, input("A1", 100), DAY1);

      expect(store.getListing("A1")).toBeUndefined();
      expect(await tx.getListing("A1")).not.toBeNull();

      await tx.rollback();
      expect(store.getListing("A1")).toBeUndefined();
    });

    it("should see earlier writes of the same transaction", async () => {
      const tx = await store.begin();
      const first = await reconcile(tx, input("A1", 100), DAY1);
      const second = await reconcile(tx, input("A1", 110), DAY1);
      await tx.commit();

      expect(first.action).toBe("new");
      expect(second.action).toBe("price_change");
      expect(store.getDetails("A1")?.previousPrices).toEqual({
        "2024-03-10": 100,
      });
    });
  });
});

describe("reconcileRecord", () => {
  it("should parse numeric strings and keep the raw record", async () => {
    const store = new MemoryListingStore();
    const raw = { propertyCode: 4711, price: "250000", rooms: 2 };

    const tx = await store.begin();
    const result = await reconcileRecord(tx, raw, DAY1);
    await tx.commit();

    expect(result.action).toBe("new");
    expect(store.getDetails("4711")).toEqual({
      propertyCode: "4711",
      price: 250000,
      previousPrices: {},
      allFields: raw,
    });
  });

  it("should skip records without a price", async () => {
    const store = new MemoryListingStore();

    const tx = await store.begin();
    const result = await reconcileRecord(tx, { propertyCode: "A1" }, DAY1);
    await tx.commit();

    expect(result).toEqual({ action: "skipped" });
    expect(store.size()).toBe(0);
  });
});
