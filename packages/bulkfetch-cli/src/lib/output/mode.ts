/**
 * Output mode detection for determining how to render CLI output.
 */

import { isJsonMode, isQuietMode } from "../cli-context.js";

export type OutputMode = "interactive" | "static" | "json";

/**
 * Detect the appropriate output mode based on context and environment.
 *
 * - `interactive`: TTY with a live spinner
 * - `static`: plain lines (CI, pipes, dumb terminals, --quiet)
 * - `json`: structured JSON on stdout, nothing else
 */
export function getOutputMode(
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout.isTTY === true
): OutputMode {
  if (isJsonMode()) {
    return "json";
  }

  if (isQuietMode() || env.CI || !isTTY || env.TERM === "dumb") {
    return "static";
  }

  return "interactive";
}
