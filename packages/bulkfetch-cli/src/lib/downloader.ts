import type { HttpTransport } from "./ports/http.js";
import type { ProgressReporter } from "./ports/progress.js";
import type { Logger } from "./logger.js";
import type { CsvEntry, DownloadRecord, SkippedRow } from "./csv-reader.js";
import type { OutputWriter } from "./output-writer.js";
import { deriveStem } from "./filename.js";
import { FetchError, WriteError } from "./errors/types.js";
import { fetchHttpStatus, fetchInvalidUrl, fetchNetworkError } from "./errors/catalog.js";
import { asError } from "./errors/errno.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FetchOptions {
  timeoutMs: number;
  userAgent: string;
  signal?: AbortSignal;
}

export interface FetchedResource {
  body: Uint8Array;
  contentType?: string;
}

/** What happened to one CSV entry */
export type DownloadOutcome =
  | {
      status: "fetched-and-written";
      record: DownloadRecord;
      path: string;
      filename: string;
      bytes: number;
    }
  | { status: "fetch-failed"; record: DownloadRecord; error: FetchError }
  | { status: "write-failed"; record: DownloadRecord; error: WriteError }
  | { status: "skipped-no-url"; row: SkippedRow };

export type FailedOutcome = Extract<DownloadOutcome, { status: "fetch-failed" | "write-failed" }>;

export interface DownloadSummary {
  /** Entries in the CSV, including skipped rows */
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  /** Stopped by a signal before every entry was handled */
  interrupted: boolean;
  outcomes: DownloadOutcome[];
}

export interface BatchDependencies {
  transport: HttpTransport;
  writer: OutputWriter;
  progress: ProgressReporter;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const EXIT_CODES = {
  success: 0,
  recordFailures: 1,
  invalidInput: 2,
  /** Unexpected failure outside any record */
  internalError: 70,
  interrupted: 130,
} as const;

// ---------------------------------------------------------------------------
// Fetch
// ---------------------------------------------------------------------------

/**
 * Reject anything that is not an absolute http(s) URL.
 */
export function assertHttpUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw fetchInvalidUrl(url);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw fetchInvalidUrl(url);
  }
  return parsed;
}

/**
 * GET one URL and return its body. Any non-2xx status is a FetchError.
 */
export async function fetchResource(
  transport: HttpTransport,
  url: string,
  options: FetchOptions
): Promise<FetchedResource> {
  assertHttpUrl(url);

  let response;
  try {
    response = await transport.get(url, {
      timeoutMs: options.timeoutMs,
      headers: { "User-Agent": options.userAgent, Accept: "*/*" },
      signal: options.signal,
    });
  } catch (error) {
    throw error instanceof FetchError ? error : fetchNetworkError(url, asError(error));
  }

  if (response.status < 200 || response.status > 299) {
    throw fetchHttpStatus(url, response.status, response.statusText);
  }

  return { body: response.body, contentType: response.contentType };
}

// ---------------------------------------------------------------------------
// Batch
// ---------------------------------------------------------------------------

async function processRecord(
  record: DownloadRecord,
  deps: BatchDependencies,
  options: FetchOptions
): Promise<DownloadOutcome> {
  const log = deps.logger.child({ line: record.line, sku: record.sku });

  let resource: FetchedResource;
  try {
    log.debug("Requesting", { url: record.url });
    resource = await fetchResource(deps.transport, record.url, options);
  } catch (error) {
    const fetchError =
      error instanceof FetchError ? error : fetchNetworkError(record.url, asError(error));
    log.error("Download failed", { url: record.url, code: fetchError.code, error: fetchError.message });
    return { status: "fetch-failed", record, error: fetchError };
  }

  try {
    const written = await deps.writer.write(record, resource.body, resource.contentType);
    log.debug("Downloaded", { path: written.path, bytes: written.bytes });
    return { status: "fetched-and-written", record, ...written };
  } catch (error) {
    if (!(error instanceof WriteError)) throw error;
    log.error("Write failed", { path: error.path, code: error.code, error: error.message });
    return { status: "write-failed", record, error };
  }
}

/**
 * One-line description of an outcome for progress output.
 */
export function describeOutcome(outcome: DownloadOutcome): string {
  switch (outcome.status) {
    case "fetched-and-written":
      return outcome.filename;
    case "fetch-failed":
    case "write-failed":
      return `${deriveStem(outcome.record)} failed: ${outcome.error.message}`;
    case "skipped-no-url":
      return `${deriveStem(outcome.row)} skipped (no URL)`;
  }
}

export function isFailure(outcome: DownloadOutcome): outcome is FailedOutcome {
  return outcome.status === "fetch-failed" || outcome.status === "write-failed";
}

/**
 * Count outcomes by kind.
 */
export function summarize(
  outcomes: DownloadOutcome[],
  total: number,
  interrupted = false
): DownloadSummary {
  let succeeded = 0;
  let failed = 0;
  let skipped = 0;

  for (const outcome of outcomes) {
    if (outcome.status === "fetched-and-written") succeeded++;
    else if (outcome.status === "skipped-no-url") skipped++;
    else failed++;
  }

  return { total, succeeded, failed, skipped, interrupted, outcomes };
}

export function exitCodeFor(summary: DownloadSummary): number {
  if (summary.interrupted) return EXIT_CODES.interrupted;
  if (summary.failed > 0) return EXIT_CODES.recordFailures;
  return EXIT_CODES.success;
}

/**
 * Download every entry in order, one at a time.
 * Progress advances after each entry whatever happened to it; a failed
 * record never stops the batch. Only the abort signal does.
 */
export async function downloadBatch(
  entries: CsvEntry[],
  deps: BatchDependencies,
  options: FetchOptions
): Promise<DownloadSummary> {
  const total = entries.length;
  const outcomes: DownloadOutcome[] = [];

  deps.progress.start(total);
  try {
    for (const entry of entries) {
      if (options.signal?.aborted) break;

      let outcome: DownloadOutcome;
      if (entry.kind === "skipped") {
        deps.logger.warn("Skipping row without URL", {
          line: entry.row.line,
          name: entry.row.name,
          sku: entry.row.sku,
        });
        outcome = { status: "skipped-no-url", row: entry.row };
      } else {
        outcome = await processRecord(entry.record, deps, options);
      }

      outcomes.push(outcome);
      deps.progress.advance(outcomes.length, total, describeOutcome(outcome));
    }
  } finally {
    deps.progress.stop();
  }

  return summarize(outcomes, total, options.signal?.aborted === true);
}
