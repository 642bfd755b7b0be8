import { describe, expect, it, vi } from "vitest";
import { createBus } from "../src/bus";
import { MemoryBus } from "../src/bus/memory-bus";
import { ScanFailedEvent } from "../src/bus/types";
import { Logger } from "../src/service/types";

const quiet: Logger = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

const FAILED: ScanFailedEvent = {
  type: "scan_failed",
  id: "daily-20240310-030000",
  timestamp: "2024-03-10T03:00:05.000Z",
  data: {
    jobId: "daily-20240310-030000",
    jobType: "daily_new_listings",
    error: "Database unavailable",
  },
};

describe("MemoryBus", () => {
  it("should keep published events in order", async () => {
    const bus = new MemoryBus("test", quiet);
    const second = { ...FAILED, id: "daily-20240311-030000" };

    await bus.publish(FAILED);
    await bus.publish(second);

    expect(bus.getPublishedEvents()).toEqual([FAILED, second]);
  });

  it("should clear history", async () => {
    const bus = new MemoryBus("test", quiet);
    await bus.publish(FAILED);

    bus.clearHistory();

    expect(bus.getPublishedEvents()).toEqual([]);
  });

  it("should be created by the factory", () => {
    expect(
      createBus({ type: "memory", serviceName: "test", logger: quiet })
    ).toBeInstanceOf(MemoryBus);
  });

  it("should require a url for redis", () => {
    expect(() => createBus({ type: "redis", serviceName: "test" })).toThrow(
      "Redis URL is required for Redis bus"
    );
  });
});
