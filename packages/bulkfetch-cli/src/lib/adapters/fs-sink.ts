import { mkdir, writeFile } from "fs/promises";
import type { FileSink } from "../ports/file-sink.js";

/**
 * Real file sink backed by fs/promises.
 */
export const nodeFileSink: FileSink = {
  async ensureDir(dir: string): Promise<void> {
    await mkdir(dir, { recursive: true });
  },

  async writeFile(path: string, data: Uint8Array | string): Promise<void> {
    await writeFile(path, data);
  },
};
