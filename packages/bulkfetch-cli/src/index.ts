#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { z } from "zod";
import { initContext, isQuietMode } from "./lib/cli-context.js";
import { getOutputMode } from "./lib/output/mode.js";
import {
  createNodeFetchTransport,
  createProcessSignalHandler,
  nodeFileSink,
} from "./lib/adapters/index.js";
import { exitCodeForParseError, registerDownloadCommand } from "./modules/download.js";

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  return PackageJsonSchema.parse(raw).version;
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);
  const version = readVersion();

  const program = new Command()
    .name("bulkfetch")
    .description("Download every URL listed in a CSV file")
    .version(version, "-V, --version");

  registerDownloadCommand(program, () => ({
    transport: createNodeFetchTransport(),
    sink: nodeFileSink,
    signals: createProcessSignalHandler(),
    mode: getOutputMode(),
    quiet: isQuietMode(),
    version,
  }));

  try {
    await program.parseAsync(argv);
  } catch (error) {
    process.exitCode = exitCodeForParseError(error);
  }
}

void main();
