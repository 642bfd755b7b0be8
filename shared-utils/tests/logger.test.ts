import { afterEach, describe, expect, it, vi } from "vitest";
import { ConsoleLogger, createLogger, parseLogLevel } from "../src/service/logger";

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should prefix messages with the logger name", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    new ConsoleLogger("collector").info("Scan started", { page: 1 });

    expect(log).toHaveBeenCalledWith("[collector] Scan started", { page: 1 });
  });

  it("should drop messages below the level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const logger = new ConsoleLogger("collector", "warn");
    logger.info("hidden");
    logger.warn("shown");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[collector] shown");
  });

  it("should give children a nested name and the same level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const child = createLogger("collector", "error").child("scan");
    child.info("hidden");
    child.error("boom");

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("[collector:scan] boom");
  });

  it("should parse level names", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel("warning")).toBe("warn");
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("verbose")).toBe("info");
  });
});
