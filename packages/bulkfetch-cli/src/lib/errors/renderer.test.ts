import { describe, it, expect, vi } from "vitest";
import chalk from "chalk";
import {
  formatJsonError,
  formatStaticError,
  renderError,
  renderUnknownError,
  wrapText,
} from "./renderer.js";
import { CLIError } from "./types.js";
import { inputFileNotFound, invalidConfig } from "./catalog.js";

describe("renderer", () => {
  describe("wrapText", () => {
    it("breaks on spaces and indents continuation lines", () => {
      expect(wrapText("one two three four", 9, "  ")).toEqual(["one two", "  three", "  four"]);
    });

    it("keeps a word longer than the width on its own line", () => {
      expect(wrapText("a verylongword b", 5)).toEqual(["a", "verylongword", "b"]);
    });
  });

  describe("formatStaticError", () => {
    it("prints message, details and suggestion", () => {
      const error = invalidConfig("/tmp/c.yaml", "download.timeoutMs: too small");

      expect(formatStaticError(error, 80)).toEqual([
        "",
        `${chalk.red("✗")} ${chalk.red.bold("Invalid config file: /tmp/c.yaml")}`,
        "",
        `  ${chalk.dim("download.timeoutMs: too small")}`,
        "",
        `  ${chalk.yellow("→")} Fix the file or pass another one with --config`,
        "",
      ]);
    });

    it("adds the example when there is one", () => {
      const error = new CLIError("UNKNOWN_ERROR", "boom", { example: "bulkfetch items.csv" });

      expect(formatStaticError(error, 80)).toEqual([
        "",
        `${chalk.red("✗")} ${chalk.red.bold("boom")}`,
        "",
        `  ${chalk.dim("Try:")} ${chalk.cyan("bulkfetch items.csv")}`,
        "",
      ]);
    });
  });

  describe("formatJsonError", () => {
    it("drops undefined fields", () => {
      expect(formatJsonError(new CLIError("UNKNOWN_ERROR", "boom"))).toEqual({
        code: "UNKNOWN_ERROR",
        message: "boom",
      });
    });
  });

  describe("renderError", () => {
    it("writes a JSON envelope to stderr in json mode", () => {
      const spy = vi.spyOn(console, "error").mockImplementation(() => {});

      renderError(inputFileNotFound("/tmp/missing.csv"), "json");

      expect(spy).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(spy.mock.calls[0][0]))).toMatchObject({
        success: false,
        error: { code: "INPUT_FILE_NOT_FOUND", message: "CSV file not found: /tmp/missing.csv" },
      });
    });

    it("wraps plain errors as UNKNOWN_ERROR", () => {
      const spy = vi.spyOn(console, "error").mockImplementation(() => {});

      renderUnknownError(new Error("socket closed"), "json");

      expect(JSON.parse(String(spy.mock.calls[0][0]))).toEqual({
        success: false,
        error: { code: "UNKNOWN_ERROR", message: "socket closed" },
      });
    });
  });
});
