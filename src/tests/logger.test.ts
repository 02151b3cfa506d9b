import { afterEach, describe, expect, test, vi } from "vitest";
import { formatEntry, Logger, loggerOptionsFromEnv } from "../utils/logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("formatEntry", () => {
  const entry = {
    timestamp: "2024-01-02T03:04:05.678Z",
    level: "warn" as const,
    scope: "dca",
    message: "m",
    data: { a: 1 },
  };

  test("pretty", () => {
    expect(formatEntry(entry, "pretty")).toBe('03:04:05 [WRN] │ dca m │ {"a":1}');
    expect(formatEntry({ timestamp: entry.timestamp, level: "info", message: "plain" }, "pretty")).toBe(
      "03:04:05 [INF] plain",
    );
  });

  test("json", () => {
    expect(JSON.parse(formatEntry(entry, "json"))).toEqual(entry);
  });
});

describe("Logger", () => {
  test("filters by level and scope", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const info = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new Logger({ level: "warn", scopes: ["dca"], format: "json" });

    logger.info("too quiet", "dca");
    logger.warn("other scope", "store");
    logger.withScope("dca").warn("kept");
    logger.warn("unscoped");

    expect(info).not.toHaveBeenCalled();
    expect(warn.mock.calls.map(([line]) => JSON.parse(String(line)).message)).toEqual(["kept", "unscoped"]);
  });

  test("configure replaces the options", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger({ level: "error", scopes: [], format: "pretty" });
    logger.configure({ level: "error", scopes: ["store"], format: "pretty" });

    logger.error("dropped", "dca");
    logger.error("written", "store");

    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0][0])).toMatch(/\[ERR\] │ store written$/);
  });
});

describe("loggerOptionsFromEnv", () => {
  test("falls back to info and pretty", () => {
    expect(loggerOptionsFromEnv({ LOG_LEVEL: "loud", LOG_FORMAT: "xml" })).toEqual({
      level: "info",
      scopes: [],
      format: "pretty",
    });
    expect(loggerOptionsFromEnv({ LOG_LEVEL: " Trace ", LOG_SCOPES: "dca, ,cast", LOG_FORMAT: "JSON" })).toEqual({
      level: "trace",
      scopes: ["dca", "cast"],
      format: "json",
    });
  });
});
