import { CLIError, FetchError, InputError, WriteError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 * Each function produces a consistent, user-friendly error message.
 */

const USAGE_EXAMPLE = "bulkfetch products.csv";

// ============================================================================
// Input Errors
// ============================================================================

export function inputFileNotFound(path: string): InputError {
  return new InputError("INPUT_FILE_NOT_FOUND", path, `CSV file not found: ${path}`, {
    suggestion: "Check the path and try again",
    example: USAGE_EXAMPLE,
  });
}

export function inputNotAFile(path: string): InputError {
  return new InputError("INPUT_NOT_A_FILE", path, `Not a file: ${path}`, {
    suggestion: "Pass the path of a CSV file, not a directory",
    example: USAGE_EXAMPLE,
  });
}

export function inputNotReadable(path: string, cause?: Error): InputError {
  return new InputError("INPUT_FILE_NOT_READABLE", path, `Cannot read CSV file: ${path}`, {
    suggestion: "Check the file permissions",
    details: cause?.message,
    cause,
  });
}

export function inputEmpty(path: string): InputError {
  return new InputError("INPUT_FILE_EMPTY", path, `CSV file is empty: ${path}`, {
    suggestion: "The first line must be a header with Name, SKU and URL columns",
  });
}

export function inputMissingColumns(path: string, missing: string[]): InputError {
  return new InputError(
    "INPUT_MISSING_COLUMNS",
    path,
    `CSV header is missing required column${missing.length === 1 ? "" : "s"}: ${missing.join(", ")}`,
    {
      suggestion: "The header row must contain Name, SKU and URL (any order, any case)",
      example: "Name,SKU,URL",
    }
  );
}

export function inputMalformed(path: string, cause?: Error): InputError {
  return new InputError("INPUT_MALFORMED_CSV", path, `Cannot parse CSV file: ${path}`, {
    suggestion: "Check for unbalanced quotes in the file",
    details: cause?.message,
    cause,
  });
}

export function inputNotUtf8(path: string, cause?: Error): InputError {
  return new InputError("INPUT_MALFORMED_CSV", path, `CSV file is not valid UTF-8: ${path}`, {
    suggestion: "Re-save the file with UTF-8 encoding",
    details: cause?.message,
    cause,
  });
}

// ============================================================================
// Fetch Errors
// ============================================================================

export function fetchInvalidUrl(url: string): FetchError {
  return new FetchError("FETCH_INVALID_URL", url, `Not an http(s) URL: ${url}`);
}

export function fetchHttpStatus(url: string, status: number, statusText: string): FetchError {
  const text = statusText ? ` ${statusText}` : "";
  return new FetchError("FETCH_HTTP_STATUS", url, `HTTP ${status}${text}`, { status });
}

export function fetchDnsFailed(url: string, cause?: Error): FetchError {
  return new FetchError("FETCH_DNS_FAILED", url, "Host could not be resolved", {
    details: cause?.message,
    cause,
  });
}

export function fetchConnectionRefused(url: string, cause?: Error): FetchError {
  return new FetchError("FETCH_CONNECTION_REFUSED", url, "Connection refused", {
    details: cause?.message,
    cause,
  });
}

export function fetchTimeout(url: string, timeoutMs: number): FetchError {
  return new FetchError("FETCH_TIMEOUT", url, `Timed out after ${timeoutMs}ms`, {
    suggestion: "Raise the limit with --timeout <ms>",
  });
}

export function fetchAborted(url: string): FetchError {
  return new FetchError("FETCH_ABORTED", url, "Interrupted");
}

export function fetchNetworkError(url: string, cause?: Error): FetchError {
  return new FetchError("FETCH_NETWORK_ERROR", url, cause?.message ?? "Network error", {
    cause,
  });
}

// ============================================================================
// Write Errors
// ============================================================================

export function writeDirFailed(dir: string, cause?: Error): WriteError {
  return new WriteError("WRITE_DIR_FAILED", dir, `Cannot create output directory: ${dir}`, {
    details: cause?.message,
    cause,
  });
}

export function writePermissionDenied(path: string, cause?: Error): WriteError {
  return new WriteError("WRITE_PERMISSION_DENIED", path, `Permission denied: ${path}`, {
    cause,
  });
}

export function writeDiskFull(path: string, cause?: Error): WriteError {
  return new WriteError("WRITE_DISK_FULL", path, `No space left on device: ${path}`, {
    cause,
  });
}

export function writeFailed(path: string, cause?: Error): WriteError {
  return new WriteError("WRITE_FAILED", path, `Cannot write ${path}: ${cause?.message ?? "unknown error"}`, {
    cause,
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidOption(option: string, value: string, expected: string): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid value for ${option}: ${value}`, {
    suggestion: `Expected ${expected}`,
  });
}

export function invalidConfig(path: string, details: string): CLIError {
  return new CLIError("VALIDATION_CONFIG_INVALID", `Invalid config file: ${path}`, {
    suggestion: "Fix the file or pass another one with --config",
    details,
  });
}
