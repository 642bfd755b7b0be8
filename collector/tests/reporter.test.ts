import { MemoryBus } from "@listing-tracker/shared-utils";
import { describe, expect, it, vi } from "vitest";
import { BusReporter } from "../src/adapters/reporter.bus";
import { LogReporter } from "../src/adapters/reporter.log";
import { ScanSummary } from "../src/core/dto";
import { silentLogger } from "./helpers";

const SUMMARY: ScanSummary = {
  jobId: "weekly-20240310-030000",
  jobType: "weekly_full_scan",
  startTime: "2024-03-10T03:00:00.000Z",
  endTime: "2024-03-10T03:02:30.000Z",
  durationSeconds: 150,
  totalPages: 3,
  totalProperties: 120,
  actionCounts: {
    new: 10,
    price_change: 4,
    republished: 1,
    active: 104,
    skipped: 1,
  },
  deactivatedCount: 6,
  scanStartTimestamp: "2024-03-10T03:00:00.000Z",
  databaseStats: {
    totalListings: 500,
    activeListings: 450,
    inactiveListings: 50,
    republishedListings: 7,
  },
};

const NOW = new Date("2024-03-10T03:02:31Z");

describe("BusReporter", () => {
  it("should publish scan_completed", async () => {
    const bus = new MemoryBus("test", silentLogger);
    const reporter = new BusReporter(bus, silentLogger, () => NOW);

    await reporter.report(SUMMARY);

    expect(bus.getPublishedEvents()).toEqual([
      {
        type: "scan_completed",
        id: "weekly-20240310-030000",
        timestamp: "2024-03-10T03:02:31.000Z",
        data: {
          jobId: "weekly-20240310-030000",
          jobType: "weekly_full_scan",
          durationSeconds: 150,
          totalPages: 3,
          totalProperties: 120,
          actionCounts: SUMMARY.actionCounts,
          deactivatedCount: 6,
        },
      },
    ]);
  });

  it("should publish scan_failed with the error message", async () => {
    const bus = new MemoryBus("test", silentLogger);
    const reporter = new BusReporter(bus, silentLogger, () => NOW);

    await reporter.reportFailure(
      "daily-20240310-030000",
      "daily_new_listings",
      new Error("Database unavailable")
    );

    expect(bus.getPublishedEvents()).toEqual([
      {
        type: "scan_failed",
        id: "daily-20240310-030000",
        timestamp: "2024-03-10T03:02:31.000Z",
        data: {
          jobId: "daily-20240310-030000",
          jobType: "daily_new_listings",
          error: "Database unavailable",
        },
      },
    ]);
  });
});

describe("LogReporter", () => {
  it("should log the summary and failures", async () => {
    const logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    const reporter = new LogReporter(logger);

    await reporter.report(SUMMARY);
    await reporter.reportFailure("daily-1", "daily_new_listings", "timeout");

    expect(logger.info).toHaveBeenCalledWith(
      "Job weekly-20240310-030000 summary:",
      expect.objectContaining({ totalProperties: 120, deactivatedCount: 6 })
    );
    expect(logger.error).toHaveBeenCalledWith(
      "Job daily-1 (daily_new_listings) failed: timeout"
    );
  });
});
