import { describe, it, expect, vi } from "vitest";
import {
  consoleSink,
  createLogger,
  createNoopLogger,
  type LogLevel,
} from "./logger.js";

const FIXED = new Date("2026-01-02T03:04:05.000Z");

function capture(level: LogLevel, json = false) {
  const lines: Array<[LogLevel, string]> = [];
  const logger = createLogger({
    level,
    json,
    sink: (lvl, line) => lines.push([lvl, line]),
    now: () => FIXED,
  });
  return { logger, lines };
}

describe("logger", () => {
  describe("level filtering", () => {
    it("drops messages below the configured level", () => {
      const { logger, lines } = capture("warn");

      logger.debug("d");
      logger.info("i");
      logger.warn("w");
      logger.error("e");

      expect(lines.map(([level]) => level)).toEqual(["warn", "error"]);
    });

    it("passes everything at debug", () => {
      const { logger, lines } = capture("debug");

      logger.debug("d");
      logger.info("i");

      expect(lines).toHaveLength(2);
    });
  });

  describe("human format", () => {
    it("prints timestamp, padded level, message and meta", () => {
      const { logger, lines } = capture("info");

      logger.info("hello", { a: 1 });

      expect(lines[0]).toEqual(["info", '[2026-01-02T03:04:05.000Z] INFO  hello {"a":1}']);
    });

    it("omits empty meta", () => {
      const { logger, lines } = capture("info");

      logger.error("boom");

      expect(lines[0][1]).toBe("[2026-01-02T03:04:05.000Z] ERROR boom");
    });
  });

  describe("JSON format", () => {
    it("writes one object per line", () => {
      const { logger, lines } = capture("info", true);

      logger.warn("slow", { url: "https://example.com/a.jpg" });

      expect(JSON.parse(lines[0][1])).toEqual({
        timestamp: "2026-01-02T03:04:05.000Z",
        level: "warn",
        message: "slow",
        url: "https://example.com/a.jpg",
      });
    });
  });

  describe("child", () => {
    it("merges default meta under call meta", () => {
      const { logger, lines } = capture("info", true);
      const child = logger.child({ line: 2, sku: "123" }).child({ sku: "456" });

      child.info("done", { bytes: 8 });

      expect(JSON.parse(lines[0][1])).toMatchObject({ line: 2, sku: "456", bytes: 8 });
    });
  });

  describe("consoleSink", () => {
    it("sends warn and error to stderr", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const error = vi.spyOn(console, "error").mockImplementation(() => {});

      consoleSink("info", "a");
      consoleSink("warn", "b");
      consoleSink("error", "c");

      expect(log.mock.calls).toEqual([["a"]]);
      expect(error.mock.calls).toEqual([["b"], ["c"]]);
    });
  });

  it("no-op logger accepts calls and children", () => {
    const logger = createNoopLogger();

    expect(() => logger.child({ a: 1 }).error("x")).not.toThrow();
  });
});
