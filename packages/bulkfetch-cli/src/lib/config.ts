import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { invalidConfig } from "./errors/catalog.js";
import { asError } from "./errors/errno.js";
import { LOG_LEVEL_NAMES, type LogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/bulkfetch/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(homedir(), ".config", "bulkfetch", "config.yaml");

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  timeoutMs: 30_000,
  outDir: "out",
  manifest: false,
  logLevel: "warn",
  logJson: false,
} as const;

const MIN_TIMEOUT_MS = 1_000;
const MAX_TIMEOUT_MS = 600_000;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

export const TimeoutSchema = z.number().int().min(MIN_TIMEOUT_MS).max(MAX_TIMEOUT_MS);

/** Complete configuration file schema */
export const ConfigFileSchema = z
  .object({
    download: z
      .object({
        timeoutMs: TimeoutSchema.optional(),
        userAgent: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    output: z
      .object({
        dir: z.string().min(1).optional(),
        manifest: z.boolean().optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: z.enum(LOG_LEVEL_NAMES).optional(),
        json: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  timeoutMs: number;
  userAgent: string;
  outDir: string;
  manifest: boolean;
  logLevel: LogLevel;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 * Throws VALIDATION_CONFIG_INVALID if the file exists but is unusable.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, `Cannot read file: ${asError(err).message}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, `Invalid YAML: ${asError(err).message}`);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw invalidConfig(path, issues);
  }

  return result.data;
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.download?.timeoutMs !== undefined) {
    target.timeoutMs = source.download.timeoutMs;
  }
  if (source.download?.userAgent !== undefined) {
    target.userAgent = source.download.userAgent;
  }
  if (source.output?.dir !== undefined) {
    target.outDir = source.output.dir;
  }
  if (source.output?.manifest !== undefined) {
    target.manifest = source.output.manifest;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

const EnvSchema = z.object({
  BULKFETCH_TIMEOUT: z.coerce.number().pipe(TimeoutSchema).optional(),
  BULKFETCH_OUT_DIR: z.string().min(1).optional(),
  BULKFETCH_LOG_LEVEL: z.enum(LOG_LEVEL_NAMES).optional(),
});

/**
 * Read overrides from BULKFETCH_* environment variables.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): Partial<ResolvedConfig> {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw invalidConfig("environment", issues);
  }

  return filterUndefined({
    timeoutMs: result.data.BULKFETCH_TIMEOUT,
    outDir: result.data.BULKFETCH_OUT_DIR,
    logLevel: result.data.BULKFETCH_LOG_LEVEL,
  });
}

/**
 * Filter out undefined values from an object.
 */
function filterUndefined<T extends object>(obj: T): Partial<T> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  ) as Partial<T>;
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > Environment > User config > System config > Defaults
 */
export function resolveConfig(
  defaultUserAgent: string,
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined,
  envOverrides: Partial<ResolvedConfig> = {}
): ResolvedConfig {
  const config: ResolvedConfig = {
    timeoutMs: CONFIG_DEFAULTS.timeoutMs,
    userAgent: defaultUserAgent,
    outDir: CONFIG_DEFAULTS.outDir,
    manifest: CONFIG_DEFAULTS.manifest,
    logLevel: CONFIG_DEFAULTS.logLevel,
    logJson: CONFIG_DEFAULTS.logJson,
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  Object.assign(config, filterUndefined(envOverrides));
  Object.assign(config, filterUndefined(cliOptions));

  return config;
}

/**
 * Load configuration from all sources.
 *
 * @param explicitPath - Replaces the system and user files when given
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(options: {
  defaultUserAgent: string;
  cliOptions?: Partial<ResolvedConfig>;
  explicitPath?: string;
  env?: NodeJS.ProcessEnv;
}): { config: ResolvedConfig; sources: string[] } {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (options.explicitPath) {
    userConfig = loadConfigFile(options.explicitPath);
    if (!userConfig) {
      throw invalidConfig(options.explicitPath, "File does not exist");
    }
    sources.push(options.explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(
    options.defaultUserAgent,
    options.cliOptions,
    userConfig,
    systemConfig,
    readEnvOverrides(options.env)
  );

  return { config, sources };
}
