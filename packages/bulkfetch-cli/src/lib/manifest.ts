import { basename, dirname, extname, join } from "path";
import { stringify } from "csv-stringify/sync";
import type { FileSink } from "./ports/file-sink.js";
import type { DownloadOutcome } from "./downloader.js";
import { toWriteError } from "./output-writer.js";

export const MANIFEST_COLUMNS = ["Id", "Name", "SKU", "File"] as const;

/**
 * `importable_<stem><ext>` beside the input CSV.
 */
export function manifestPathFor(csvPath: string): string {
  const ext = extname(csvPath);
  const stem = basename(csvPath, ext);
  return join(dirname(csvPath), `importable_${stem}${ext || ".csv"}`);
}

/**
 * One row per written record, mapping it to its file in the output directory.
 */
export function buildManifest(outcomes: DownloadOutcome[]): string {
  const rows: Array<Record<(typeof MANIFEST_COLUMNS)[number], string>> = [];
  for (const outcome of outcomes) {
    if (outcome.status !== "fetched-and-written") continue;
    const { record, filename } = outcome;
    rows.push({ Id: record.id ?? "", Name: record.name, SKU: record.sku, File: filename });
  }

  return stringify(rows, { header: true, columns: [...MANIFEST_COLUMNS] });
}

/**
 * Write the manifest for `csvPath` and return where it went.
 * Throws WriteError.
 */
export async function writeManifest(
  sink: FileSink,
  csvPath: string,
  outcomes: DownloadOutcome[]
): Promise<string> {
  const path = manifestPathFor(csvPath);
  try {
    await sink.writeFile(path, buildManifest(outcomes));
  } catch (error) {
    throw toWriteError(path, error);
  }
  return path;
}
