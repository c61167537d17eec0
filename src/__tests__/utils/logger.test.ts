import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { createConsoleLogger, silentLogger } from "../../utils/logger.js";

describe("createConsoleLogger()", () => {
  let write: MockInstance<typeof console.error>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-01T00:00:00.000Z"));
    write = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    write.mockRestore();
    vi.useRealTimers();
  });

  it("writes one JSON line per event", () => {
    createConsoleLogger({ level: "debug" }).debug("ddb.getItem", { table: "people" });
    expect(write).toHaveBeenCalledOnce();
    expect(write).toHaveBeenCalledWith(
      '{"ts":"2024-01-01T00:00:00.000Z","level":"debug","event":"ddb.getItem","table":"people"}',
    );
  });

  it("drops events below the minimum level", () => {
    const logger = createConsoleLogger({ level: "warn" });
    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");
    expect(write).toHaveBeenCalledTimes(2);
  });

  it("defaults to info", () => {
    const logger = createConsoleLogger();
    logger.debug("hidden");
    logger.info("shown");
    expect(write).toHaveBeenCalledWith(
      '{"ts":"2024-01-01T00:00:00.000Z","level":"info","event":"shown"}',
    );
    expect(write).toHaveBeenCalledOnce();
  });
});

describe("silentLogger", () => {
  it("writes nothing", () => {
    const write = vi.spyOn(console, "error").mockImplementation(() => {});
    silentLogger.error("ddb.query.failed", { table: "people" });
    expect(write).not.toHaveBeenCalled();
    write.mockRestore();
  });
});
