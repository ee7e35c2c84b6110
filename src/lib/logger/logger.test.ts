import { afterEach, describe, expect, it, vi } from "vitest";

// Mock config before importing logger
vi.mock("../config", () => ({
  config: {
    logging: {
      level: "debug",
    },
    server: {
      nodeEnv: "test",
    },
  },
}));

import { createLogger, logger } from "./logger";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should log info messages", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    logger.info("test message");
    expect(consoleSpy).toHaveBeenCalled();
  });

  it("should log error messages with the serialized error", () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    logger.error("test error", new Error("boom"));
    expect(consoleSpy).toHaveBeenCalledWith(expect.stringContaining('"message":"boom"'));
  });

  it("should route warnings to console.warn", () => {
    const consoleSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    logger.warn("careful");
    expect(consoleSpy).toHaveBeenCalledTimes(1);
  });

  it("should include context in logs", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    logger.info("test message", { foo: "bar" });
    expect(consoleSpy).toHaveBeenCalledWith(expect.stringContaining('"foo":"bar"'));
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should drop entries below the configured level", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const quiet = createLogger({ level: "warn" });

    quiet.debug("hidden");
    quiet.info("hidden");

    expect(consoleSpy).not.toHaveBeenCalled();
  });

  it("should merge bindings into every entry", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const bound = createLogger({ level: "info", bindings: { component: "router" } });

    bound.info("routed", { orders: 2 });

    const [line] = consoleSpy.mock.calls[0] ?? [];
    expect(JSON.parse(String(line))).toMatchObject({
      level: "info",
      message: "routed",
      context: { component: "router", orders: 2 },
    });
  });

  it("should let call context override bindings", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const bound = createLogger({ level: "info", bindings: { component: "router" } });

    bound.info("override", { component: "session" });

    const [line] = consoleSpy.mock.calls[0] ?? [];
    expect(JSON.parse(String(line)).context).toEqual({ component: "session" });
  });
});
