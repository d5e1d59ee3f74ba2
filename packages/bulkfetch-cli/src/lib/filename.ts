import { extname } from "path";
import type { DownloadRecord } from "./csv-reader.js";

const UNSAFE_CHARACTERS = /[^A-Za-z0-9_-]+/g;
const FILE_EXTENSION = /^\.[A-Za-z0-9]+$/;

/** Extensions for content types whose URLs commonly lack one */
const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  "image/jpeg": ".jpg",
  "image/png": ".png",
  "image/gif": ".gif",
  "image/webp": ".webp",
  "image/svg+xml": ".svg",
  "image/avif": ".avif",
  "image/tiff": ".tif",
  "application/pdf": ".pdf",
  "application/json": ".json",
  "application/zip": ".zip",
  "text/csv": ".csv",
  "text/plain": ".txt",
  "text/html": ".html",
};

/**
 * Strip everything but letters, digits, `_` and `-`.
 * Runs of whitespace become a single `_` first.
 */
export function sanitizePart(value: string): string {
  return value.trim().split(/\s+/).join("_").replace(UNSAFE_CHARACTERS, "");
}

/**
 * `{name}-{sku}` with empty parts dropped, or `row-{line}` when both are empty.
 */
export function deriveStem(record: Pick<DownloadRecord, "name" | "sku" | "line">): string {
  const parts = [sanitizePart(record.name), sanitizePart(record.sku)].filter(Boolean);
  return parts.length > 0 ? parts.join("-") : `row-${record.line}`;
}

/**
 * Extension of the URL's last path segment, lower-cased, or undefined.
 */
export function extensionFromUrl(url: string): string | undefined {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return undefined;
  }

  const lastSegment = pathname.split("/").pop() ?? "";
  const ext = extname(decodeSafely(lastSegment));
  return FILE_EXTENSION.test(ext) ? ext.toLowerCase() : undefined;
}

function decodeSafely(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

export function extensionFromContentType(contentType: string | undefined): string | undefined {
  if (!contentType) return undefined;
  const mainType = contentType.split(";")[0].trim().toLowerCase();
  return CONTENT_TYPE_EXTENSIONS[mainType];
}

/**
 * Output filename for a record. The URL's extension wins over the
 * response content type; with neither the name has no extension.
 */
export function deriveFilename(record: DownloadRecord, contentType?: string): string {
  const ext = extensionFromUrl(record.url) ?? extensionFromContentType(contentType) ?? "";
  return `${deriveStem(record)}${ext}`;
}
