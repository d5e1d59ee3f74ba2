/**
 * Abstraction for filesystem writes.
 * Allows testing output handling without touching the disk.
 */
export interface FileSink {
  /** Create a directory and its parents; no-op if it exists */
  ensureDir(dir: string): Promise<void>;
  /** Write bytes, replacing any existing file */
  writeFile(path: string, data: Uint8Array | string): Promise<void>;
}
