import { readFile, stat } from "fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import {
  inputEmpty,
  inputFileNotFound,
  inputMalformed,
  inputMissingColumns,
  inputNotAFile,
  inputNotReadable,
  inputNotUtf8,
} from "./errors/catalog.js";
import { asError, errnoCode } from "./errors/errno.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One data row that has a URL to fetch */
export interface DownloadRecord {
  /** 1-based line number in the CSV */
  readonly line: number;
  readonly name: string;
  readonly sku: string;
  readonly url: string;
  readonly id?: string;
}

export interface SkippedRow {
  readonly line: number;
  readonly name: string;
  readonly sku: string;
  readonly reason: "missing-url";
}

export type CsvEntry =
  | { readonly kind: "record"; readonly record: DownloadRecord }
  | { readonly kind: "skipped"; readonly row: SkippedRow };

/** Header positions of the columns we use */
export interface ColumnMap {
  name: number;
  sku: number;
  url: number;
  id?: number;
}

export interface CsvBatch {
  path: string;
  columns: ColumnMap;
  entries: CsvEntry[];
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Accepted header spellings, compared lower-cased */
const COLUMN_ALIASES = {
  name: ["name"],
  sku: ["sku", "stockkeepingunit"],
  url: ["url", "image_url__c"],
  id: ["id"],
} as const;

const REQUIRED_COLUMNS = [
  ["name", "Name"],
  ["sku", "SKU"],
  ["url", "URL"],
] as const;

const ParsedRowsSchema = z.array(
  z.object({
    record: z.array(z.string()),
    info: z.object({ lines: z.number() }),
  })
);

// ---------------------------------------------------------------------------
// Header
// ---------------------------------------------------------------------------

function findColumn(header: string[], aliases: readonly string[]): number | undefined {
  const index = header.findIndex((cell) => aliases.includes(cell.trim().toLowerCase()));
  return index === -1 ? undefined : index;
}

/**
 * Locate Name, SKU and URL (and the optional Id) by name, in any order.
 * Throws INPUT_MISSING_COLUMNS listing every required column not found.
 */
export function resolveColumns(path: string, header: string[]): ColumnMap {
  const name = findColumn(header, COLUMN_ALIASES.name);
  const sku = findColumn(header, COLUMN_ALIASES.sku);
  const url = findColumn(header, COLUMN_ALIASES.url);
  const id = findColumn(header, COLUMN_ALIASES.id);

  if (name === undefined || sku === undefined || url === undefined) {
    const found = { name, sku, url };
    const missing = REQUIRED_COLUMNS.filter(([key]) => found[key] === undefined).map(
      ([, label]) => label
    );
    throw inputMissingColumns(path, missing);
  }

  return id === undefined ? { name, sku, url } : { name, sku, url, id };
}

// ---------------------------------------------------------------------------
// Rows
// ---------------------------------------------------------------------------

function cell(row: string[], index: number | undefined): string {
  if (index === undefined) return "";
  return (row[index] ?? "").trim();
}

/**
 * Turn one data row into an entry. A blank URL makes it a skipped row.
 */
export function toEntry(row: string[], line: number, columns: ColumnMap): CsvEntry {
  const name = cell(row, columns.name);
  const sku = cell(row, columns.sku);
  const url = cell(row, columns.url);

  if (!url) {
    return { kind: "skipped", row: { line, name, sku, reason: "missing-url" } };
  }

  const id = cell(row, columns.id);
  const record: DownloadRecord = id ? { line, name, sku, url, id } : { line, name, sku, url };
  return { kind: "record", record };
}

/**
 * Parse CSV text. The first non-blank row is the header.
 */
export function parseCsv(path: string, content: string): CsvBatch {
  let raw: unknown;
  try {
    raw = parse(content, {
      bom: true,
      info: true,
      relax_column_count: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    throw inputMalformed(path, asError(error));
  }

  const rows = ParsedRowsSchema.parse(raw);
  const [header, ...data] = rows;
  if (!header || header.record.every((value) => value.trim() === "")) {
    throw inputEmpty(path);
  }

  const columns = resolveColumns(path, header.record);
  const entries = data
    .filter(({ record }) => record.some((value) => value.trim() !== ""))
    .map(({ record, info }) => toEntry(record, info.lines, columns));

  return { path, columns, entries };
}

// ---------------------------------------------------------------------------
// File Access
// ---------------------------------------------------------------------------

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Read and validate the whole CSV file up front.
 * Every failure is an InputError, so nothing is fetched from a bad file.
 */
export async function readCsv(path: string): Promise<CsvBatch> {
  let stats;
  try {
    stats = await stat(path);
  } catch (error) {
    if (errnoCode(error) === "ENOENT" || errnoCode(error) === "ENOTDIR") {
      throw inputFileNotFound(path);
    }
    throw inputNotReadable(path, asError(error));
  }

  if (!stats.isFile()) {
    throw inputNotAFile(path);
  }

  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (error) {
    throw inputNotReadable(path, asError(error));
  }

  let content: string;
  try {
    content = utf8.decode(bytes);
  } catch (error) {
    throw inputNotUtf8(path, asError(error));
  }

  if (content.replace(/^\uFEFF/, "").trim() === "") {
    throw inputEmpty(path);
  }

  return parseCsv(path, content);
}
