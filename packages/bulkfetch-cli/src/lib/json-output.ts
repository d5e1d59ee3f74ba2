/**
 * JSON output utilities for machine-readable CLI output.
 */

import type { DownloadOutcome, DownloadSummary } from "./downloader.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export type OutcomeJson =
  | {
      status: "fetched-and-written";
      line: number;
      name: string;
      sku: string;
      url: string;
      path: string;
      bytes: number;
    }
  | {
      status: "fetch-failed" | "write-failed";
      line: number;
      name: string;
      sku: string;
      url: string;
      code: string;
      error: string;
      httpStatus?: number;
    }
  | { status: "skipped-no-url"; line: number; name: string; sku: string };

/**
 * `success` in the envelope means the run completed; whether every record
 * did is in `exitCode` and `summary`.
 */
export interface DownloadResultJson {
  input: string;
  outDir: string;
  manifest?: string;
  /** Process exit code for this run: 0, 1 or 130 */
  exitCode: number;
  outcomes: OutcomeJson[];
  summary: {
    total: number;
    succeeded: number;
    failed: number;
    skipped: number;
    interrupted: boolean;
  };
}

// ============================================================================
// Conversion
// ============================================================================

export function toOutcomeJson(outcome: DownloadOutcome): OutcomeJson {
  switch (outcome.status) {
    case "fetched-and-written": {
      const { line, name, sku, url } = outcome.record;
      return { status: outcome.status, line, name, sku, url, path: outcome.path, bytes: outcome.bytes };
    }
    case "fetch-failed":
    case "write-failed": {
      const { line, name, sku, url } = outcome.record;
      const httpStatus = outcome.status === "fetch-failed" ? outcome.error.status : undefined;
      return {
        status: outcome.status,
        line,
        name,
        sku,
        url,
        code: outcome.error.code,
        error: outcome.error.message,
        ...(httpStatus !== undefined && { httpStatus }),
      };
    }
    case "skipped-no-url": {
      const { line, name, sku } = outcome.row;
      return { status: outcome.status, line, name, sku };
    }
  }
}

export function toDownloadResultJson(
  input: string,
  outDir: string,
  summary: DownloadSummary,
  exitCode: number,
  manifest?: string
): DownloadResultJson {
  return {
    input,
    outDir,
    ...(manifest !== undefined && { manifest }),
    exitCode,
    outcomes: summary.outcomes.map(toOutcomeJson),
    summary: {
      total: summary.total,
      succeeded: summary.succeeded,
      failed: summary.failed,
      skipped: summary.skipped,
      interrupted: summary.interrupted,
    },
  };
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}
