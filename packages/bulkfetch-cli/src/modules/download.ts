import { Command, CommanderError } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import type { FileSink, HttpTransport, ProgressReporter, SignalHandler } from "../lib/ports/index.js";
import { createProgressReporter } from "../lib/adapters/terminal-progress.js";
import { loadConfig, TimeoutSchema, type ResolvedConfig } from "../lib/config.js";
import { readCsv, type CsvBatch } from "../lib/csv-reader.js";
import {
  downloadBatch,
  exitCodeFor,
  isFailure,
  EXIT_CODES,
  type DownloadSummary,
} from "../lib/downloader.js";
import { createOutputWriter } from "../lib/output-writer.js";
import { writeManifest } from "../lib/manifest.js";
import { createLogger, type Logger } from "../lib/logger.js";
import { invalidOption } from "../lib/errors/catalog.js";
import { isCLIError } from "../lib/errors/types.js";
import { renderError, renderUnknownError } from "../lib/errors/renderer.js";
import { outputSuccess, toDownloadResultJson } from "../lib/json-output.js";
import type { OutputMode } from "../lib/output/mode.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DownloadOptions {
  outDir?: string;
  timeout?: string;
  userAgent?: string;
  manifest?: boolean;
  config?: string;
  verbose?: boolean;
}

export interface DownloadDependencies {
  transport: HttpTransport;
  sink: FileSink;
  signals: SignalHandler;
  mode: OutputMode;
  quiet: boolean;
  version: string;
  /** Overrides the reporter picked from `mode` */
  progress?: ProgressReporter;
  env?: NodeJS.ProcessEnv;
  now?: () => number;
}

export interface DownloadReport {
  summary: DownloadSummary;
  outDir: string;
  manifestPath?: string;
  exitCode: number;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export function defaultUserAgent(version: string): string {
  return `bulkfetch/${version} (+node ${process.versions.node})`;
}

function parseTimeout(value: string): number {
  const result = TimeoutSchema.safeParse(Number(value));
  if (!result.success) {
    throw invalidOption("--timeout", value, "milliseconds between 1000 and 600000");
  }
  return result.data;
}

/**
 * Merge command-line options over env, config files and defaults.
 */
export function resolveDownloadConfig(
  options: DownloadOptions,
  deps: Pick<DownloadDependencies, "version" | "env">
): { config: ResolvedConfig; sources: string[] } {
  const cliOptions: Partial<ResolvedConfig> = {
    outDir: options.outDir,
    timeoutMs: options.timeout === undefined ? undefined : parseTimeout(options.timeout),
    userAgent: options.userAgent,
    manifest: options.manifest,
    logLevel: options.verbose ? "debug" : undefined,
  };

  return loadConfig({
    defaultUserAgent: defaultUserAgent(deps.version),
    cliOptions,
    explicitPath: options.config,
    env: deps.env ?? process.env,
  });
}

// ---------------------------------------------------------------------------
// Output Formatting
// ---------------------------------------------------------------------------

/**
 * Human-readable end-of-run summary.
 */
export function formatSummary(report: Omit<DownloadReport, "exitCode">): string[] {
  const { summary, outDir, manifestPath } = report;
  const lines: string[] = [];

  const heading = summary.interrupted
    ? chalk.yellow(`Interrupted after ${summary.outcomes.length} of ${summary.total} entries`)
    : chalk.cyan(`Processed ${summary.total} ${summary.total === 1 ? "entry" : "entries"}`);
  lines.push("", heading);
  lines.push(
    `  ${chalk.green("✓")} ${summary.succeeded} succeeded  ${chalk.red("✗")} ${summary.failed} failed  ${chalk.gray("–")} ${summary.skipped} skipped`
  );

  if (summary.succeeded > 0) {
    lines.push(`  Output: ${outDir}`);
  }
  if (manifestPath) {
    lines.push(`  Manifest: ${manifestPath}`);
  }

  const failures = summary.outcomes.filter(isFailure);
  if (failures.length > 0) {
    const table = new CliTable3({
      head: [chalk.cyan("Name"), chalk.cyan("SKU"), chalk.cyan("URL"), chalk.cyan("Reason")],
      wordWrap: true,
    });
    for (const { record, error } of failures) {
      table.push([record.name, record.sku, record.url, error.message]);
    }
    lines.push("", chalk.bold("Failures:"), table.toString());
  }

  return lines;
}

// ---------------------------------------------------------------------------
// Core Logic
// ---------------------------------------------------------------------------

/**
 * Download every row of `batch` into the configured output directory.
 * SIGINT stops the batch after the in-flight request is aborted.
 */
export async function downloadFromCsv(
  batch: CsvBatch,
  config: ResolvedConfig,
  deps: DownloadDependencies,
  progress: ProgressReporter,
  logger: Logger
): Promise<DownloadReport> {
  const controller = new AbortController();
  deps.signals.onInterrupt(() => {
    logger.warn("Interrupted, stopping");
    controller.abort();
  });

  const writer = createOutputWriter(deps.sink, config.outDir);
  let summary: DownloadSummary;
  try {
    summary = await downloadBatch(
      batch.entries,
      { transport: deps.transport, writer, progress, logger },
      { timeoutMs: config.timeoutMs, userAgent: config.userAgent, signal: controller.signal }
    );
  } finally {
    deps.signals.removeAll();
  }

  let exitCode = exitCodeFor(summary);
  let manifestPath: string | undefined;
  if (config.manifest) {
    try {
      manifestPath = await writeManifest(deps.sink, batch.path, summary.outcomes);
      logger.info("Manifest written", { path: manifestPath });
    } catch (error) {
      renderUnknownError(error, deps.mode);
      if (exitCode === EXIT_CODES.success) exitCode = EXIT_CODES.recordFailures;
    }
  }

  return { summary, outDir: writer.outDir, manifestPath, exitCode };
}

/**
 * Run the whole command and return the process exit code:
 * 0 all succeeded, 1 some record failed, 2 bad input or config, 130 interrupted.
 */
export async function runDownload(
  csvPath: string,
  options: DownloadOptions,
  deps: DownloadDependencies
): Promise<number> {
  const now = deps.now ?? Date.now;
  const startedAt = now();

  let config: ResolvedConfig;
  let sources: string[];
  try {
    ({ config, sources } = resolveDownloadConfig(options, deps));
  } catch (error) {
    renderUnknownError(error, deps.mode);
    return EXIT_CODES.invalidInput;
  }

  const progress = deps.progress ?? createProgressReporter(deps.mode, deps.quiet);
  const logger = createLogger({
    level: config.logLevel,
    json: config.logJson,
    sink: (_level, line) => progress.log(line),
  });
  logger.debug("Config loaded", { sources, timeoutMs: config.timeoutMs, outDir: config.outDir });

  let batch: CsvBatch;
  try {
    batch = await readCsv(csvPath);
  } catch (error) {
    if (!isCLIError(error)) throw error;
    renderError(error, deps.mode);
    return EXIT_CODES.invalidInput;
  }
  logger.info("CSV loaded", { path: csvPath, entries: batch.entries.length });

  const report = await downloadFromCsv(batch, config, deps, progress, logger);

  if (deps.mode === "json") {
    outputSuccess(
      toDownloadResultJson(
        csvPath,
        report.outDir,
        report.summary,
        report.exitCode,
        report.manifestPath
      ),
      { version: deps.version, duration: now() - startedAt }
    );
  } else {
    for (const line of formatSummary(report)) {
      console.log(line);
    }
  }

  return report.exitCode;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerDownloadCommand(
  program: Command,
  createDeps: () => DownloadDependencies
): void {
  program
    .exitOverride()
    .argument("<csv-file>", "CSV file with Name, SKU and URL columns")
    .option("-o, --out-dir <dir>", "Directory to save downloads (default: out)")
    .option("-t, --timeout <ms>", "Per-request timeout in milliseconds (default: 30000)")
    .option("--user-agent <ua>", "User-Agent header to send")
    .option("--manifest", "Write importable_<name>.csv beside the input")
    .option("-c, --config <path>", "Read settings from this YAML file only")
    .option("--json", "Print a JSON summary instead of progress")
    .option("-q, --quiet", "Hide progress output")
    .option("-v, --verbose", "Log every request")
    .action(async (csvFile: string, options: DownloadOptions) => {
      process.exitCode = await runDownload(csvFile, options, createDeps());
    });
}

/**
 * Exit code for an error thrown out of `program.parseAsync`.
 * Usage errors share code 2 with bad input; help and version keep 0.
 */
export function exitCodeForParseError(error: unknown, mode?: OutputMode): number {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? EXIT_CODES.success : EXIT_CODES.invalidInput;
  }
  renderUnknownError(error, mode);
  return EXIT_CODES.internalError;
}
