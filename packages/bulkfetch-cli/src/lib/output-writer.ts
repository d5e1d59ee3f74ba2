import { join, resolve } from "path";
import type { FileSink } from "./ports/file-sink.js";
import type { DownloadRecord } from "./csv-reader.js";
import { deriveFilename } from "./filename.js";
import { WriteError } from "./errors/types.js";
import {
  writeDirFailed,
  writeDiskFull,
  writeFailed,
  writePermissionDenied,
} from "./errors/catalog.js";
import { asError, errnoCode } from "./errors/errno.js";

export interface WrittenFile {
  path: string;
  filename: string;
  bytes: number;
}

export interface OutputWriter {
  /** Absolute output directory */
  readonly outDir: string;
  /** Write one record's bytes, replacing an existing file of the same name */
  write(record: DownloadRecord, body: Uint8Array, contentType?: string): Promise<WrittenFile>;
}

/**
 * Classify a filesystem failure for `path`.
 */
export function toWriteError(path: string, error: unknown): WriteError {
  if (error instanceof WriteError) return error;

  const cause = asError(error);
  switch (errnoCode(error)) {
    case "EACCES":
    case "EPERM":
    case "EROFS":
      return writePermissionDenied(path, cause);
    case "ENOSPC":
    case "EDQUOT":
      return writeDiskFull(path, cause);
    default:
      return writeFailed(path, cause);
  }
}

/**
 * Create a writer for `outDir`. The directory (and its parents) is
 * created on the first write; a failed attempt is retried on the next.
 */
export function createOutputWriter(sink: FileSink, outDir: string): OutputWriter {
  const dir = resolve(outDir);
  let dirReady = false;

  async function ensureDir(): Promise<void> {
    if (dirReady) return;
    try {
      await sink.ensureDir(dir);
    } catch (error) {
      throw writeDirFailed(dir, asError(error));
    }
    dirReady = true;
  }

  return {
    outDir: dir,

    async write(record, body, contentType) {
      await ensureDir();

      const filename = deriveFilename(record, contentType);
      const path = join(dir, filename);
      try {
        await sink.writeFile(path, body);
      } catch (error) {
        throw toWriteError(path, error);
      }

      return { path, filename, bytes: body.byteLength };
    },
  };
}
