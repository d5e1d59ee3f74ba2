import chalk from "chalk";
import type { ProgressReporter } from "../ports/progress.js";
import type { OutputMode } from "../output/mode.js";
import { createSpinner, type Spinner } from "../spinner.js";

type WriteLine = (line: string) => void;

const writeStderr: WriteLine = (line) => console.error(line);

/**
 * Live spinner: `Downloading 3/10 · Shoes-123.jpg`.
 */
export function createSpinnerProgress(
  spinner: Spinner,
  write: WriteLine = writeStderr
): ProgressReporter {
  let finished = 0;
  let expected = 0;

  return {
    start(total) {
      expected = total;
      spinner.start(total === 0 ? "Nothing to download" : `Downloading 0/${total}`);
    },
    advance(current, total, label) {
      finished = current;
      spinner.text = `Downloading ${current}/${total} ${chalk.dim("·")} ${label}`;
    },
    log(line) {
      if (!spinner.isSpinning) {
        write(line);
        return;
      }
      spinner.clear();
      write(line);
      spinner.render();
    },
    stop() {
      if (!spinner.isSpinning) return;
      if (finished === expected) {
        spinner.succeed(`Processed ${finished}/${expected}`);
      } else {
        spinner.warn(`Stopped after ${finished}/${expected}`);
      }
    },
  };
}

/**
 * Plain line per entry: `[3/10] Shoes-123.jpg`. For CI and pipes.
 */
export function createLineProgress(write: WriteLine = writeStderr): ProgressReporter {
  return {
    start(total) {
      write(`Downloading ${total} ${total === 1 ? "entry" : "entries"}`);
    },
    advance(current, total, label) {
      write(`[${current}/${total}] ${label}`);
    },
    log(line) {
      write(line);
    },
    stop() {},
  };
}

/**
 * Discards progress; log lines still go through.
 */
export function createSilentProgress(write: WriteLine = writeStderr): ProgressReporter {
  return {
    start() {},
    advance() {},
    log(line) {
      write(line);
    },
    stop() {},
  };
}

/**
 * Pick the reporter for an output mode.
 * Quiet mode shares `static` with CI, so it is passed separately.
 */
export function createProgressReporter(mode: OutputMode, quiet: boolean): ProgressReporter {
  switch (mode) {
    case "interactive":
      return createSpinnerProgress(createSpinner(mode));
    case "static":
      return quiet ? createSilentProgress() : createLineProgress();
    case "json":
      return createSilentProgress();
  }
}
