import { vi } from "vitest";
import type {
  FileSink,
  HttpGetOptions,
  HttpResponse,
  HttpTransport,
  ProgressReporter,
  SignalHandler,
} from "../lib/ports/index.js";
import type { CsvEntry, DownloadRecord } from "../lib/csv-reader.js";

export function record(line: number, name: string, sku: string, url: string): DownloadRecord {
  return { line, name, sku, url };
}

export function recordEntry(line: number, name: string, sku: string, url: string): CsvEntry {
  return { kind: "record", record: record(line, name, sku, url) };
}

export function skippedEntry(line: number, name: string, sku: string): CsvEntry {
  return { kind: "skipped", row: { line, name, sku, reason: "missing-url" } };
}

export function ok(body: string, contentType?: string): HttpResponse {
  return { status: 200, statusText: "OK", contentType, body: new TextEncoder().encode(body) };
}

export function status(code: number, statusText: string): HttpResponse {
  return { status: code, statusText, body: new Uint8Array() };
}

type Reply = HttpResponse | Error | ((options: HttpGetOptions) => HttpResponse);

/**
 * Transport answering from a URL table. Unknown URLs throw.
 */
export function createFakeTransport(replies: Record<string, Reply>) {
  const get = vi.fn(async (url: string, options: HttpGetOptions): Promise<HttpResponse> => {
    const reply = replies[url];
    if (reply === undefined) throw new Error(`Unexpected request: ${url}`);
    if (reply instanceof Error) throw reply;
    if (typeof reply === "function") return reply(options);
    return reply;
  });
  return { get } satisfies HttpTransport;
}

/**
 * In-memory file sink.
 */
export function createMemorySink() {
  const files = new Map<string, Uint8Array | string>();
  const ensureDir = vi.fn(async (_dir: string): Promise<void> => {});
  const writeFile = vi.fn(async (path: string, data: Uint8Array | string): Promise<void> => {
    files.set(path, data);
  });
  return { files, ensureDir, writeFile } satisfies FileSink & { files: Map<string, Uint8Array | string> };
}

export function createFakeProgress() {
  return {
    start: vi.fn((_total: number) => {}),
    advance: vi.fn((_current: number, _total: number, _label: string) => {}),
    log: vi.fn((_line: string) => {}),
    stop: vi.fn(() => {}),
  } satisfies ProgressReporter;
}

/**
 * Signal handler whose interrupt is fired by the test.
 */
export function createFakeSignals() {
  const callbacks: Array<() => void> = [];
  const handler = {
    onInterrupt: vi.fn((callback: () => void) => {
      callbacks.push(callback);
    }),
    removeAll: vi.fn(() => {
      callbacks.length = 0;
    }),
  } satisfies SignalHandler;

  return {
    handler,
    interrupt: () => {
      for (const callback of [...callbacks]) callback();
    },
  };
}

export function errnoError(code: string, message = code): Error {
  return Object.assign(new Error(message), { code });
}

export function text(data: Uint8Array | string | undefined): string | undefined {
  if (data === undefined || typeof data === "string") return data;
  return Buffer.from(data).toString("utf-8");
}
