import { describe, it, expect, vi } from "vitest";
import chalk from "chalk";
import {
  createLineProgress,
  createSilentProgress,
  createSpinnerProgress,
} from "./terminal-progress.js";
import { SilentSpinner, type Spinner } from "../spinner.js";

/** Records what a live spinner would have shown */
class RecordingSpinner extends SilentSpinner {
  events: string[] = [];

  override start(text?: string): Spinner {
    this.isSpinning = true;
    this.events.push(`start:${text ?? ""}`);
    return super.start(text);
  }

  override succeed(text?: string): Spinner {
    this.isSpinning = false;
    this.events.push(`succeed:${text ?? ""}`);
    return this;
  }

  override warn(text?: string): Spinner {
    this.isSpinning = false;
    this.events.push(`warn:${text ?? ""}`);
    return this;
  }

  override clear(): Spinner {
    this.events.push("clear");
    return this;
  }

  override render(): Spinner {
    this.events.push("render");
    return this;
  }
}

describe("terminal progress", () => {
  describe("spinner", () => {
    it("shows the count and the last entry", () => {
      const spinner = new RecordingSpinner();
      const progress = createSpinnerProgress(spinner, vi.fn());

      progress.start(2);
      progress.advance(1, 2, "Shoes-123.jpg");

      expect(spinner.events).toEqual(["start:Downloading 0/2"]);
      expect(spinner.text).toBe(`Downloading 1/2 ${chalk.dim("·")} Shoes-123.jpg`);
    });

    it("succeeds when every entry was handled", () => {
      const spinner = new RecordingSpinner();
      const progress = createSpinnerProgress(spinner, vi.fn());

      progress.start(1);
      progress.advance(1, 1, "Shoes-123.jpg");
      progress.stop();

      expect(spinner.events.at(-1)).toBe("succeed:Processed 1/1");
    });

    it("warns when stopped early", () => {
      const spinner = new RecordingSpinner();
      const progress = createSpinnerProgress(spinner, vi.fn());

      progress.start(3);
      progress.advance(1, 3, "Shoes-123.jpg");
      progress.stop();

      expect(spinner.events.at(-1)).toBe("warn:Stopped after 1/3");
    });

    it("says so when there is nothing to download", () => {
      const spinner = new RecordingSpinner();
      const progress = createSpinnerProgress(spinner, vi.fn());

      progress.start(0);

      expect(spinner.events).toEqual(["start:Nothing to download"]);
    });

    it("clears the frame around log lines", () => {
      const spinner = new RecordingSpinner();
      const write = vi.fn((line: string) => {
        spinner.events.push(`write:${line}`);
      });
      const progress = createSpinnerProgress(spinner, write);

      progress.start(1);
      progress.log("warning");

      expect(spinner.events).toEqual(["start:Downloading 0/1", "clear", "write:warning", "render"]);
    });

    it("writes log lines directly once stopped", () => {
      const spinner = new RecordingSpinner();
      const write = vi.fn();
      const progress = createSpinnerProgress(spinner, write);

      progress.log("late");

      expect(write).toHaveBeenCalledWith("late");
      expect(spinner.events).toEqual([]);
    });
  });

  describe("lines", () => {
    it("prints a line per entry", () => {
      const write = vi.fn();
      const progress = createLineProgress(write);

      progress.start(2);
      progress.advance(1, 2, "Shoes-123.jpg");
      progress.advance(2, 2, "Hat-7 skipped (no URL)");
      progress.stop();

      expect(write.mock.calls).toEqual([
        ["Downloading 2 entries"],
        ["[1/2] Shoes-123.jpg"],
        ["[2/2] Hat-7 skipped (no URL)"],
      ]);
    });

    it("uses the singular for one entry", () => {
      const write = vi.fn();

      createLineProgress(write).start(1);

      expect(write).toHaveBeenCalledWith("Downloading 1 entry");
    });
  });

  describe("silent", () => {
    it("prints log lines only", () => {
      const write = vi.fn();
      const progress = createSilentProgress(write);

      progress.start(2);
      progress.advance(1, 2, "x");
      progress.log("warning");
      progress.stop();

      expect(write.mock.calls).toEqual([["warning"]]);
    });
  });
});
