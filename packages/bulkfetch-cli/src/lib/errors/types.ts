/**
 * Error codes for all CLI error types.
 * Each code maps to a specific error scenario with predefined messaging.
 */
export type InputErrorCode =
  | "INPUT_FILE_NOT_FOUND"
  | "INPUT_NOT_A_FILE"
  | "INPUT_FILE_NOT_READABLE"
  | "INPUT_FILE_EMPTY"
  | "INPUT_MISSING_COLUMNS"
  | "INPUT_MALFORMED_CSV";

export type FetchErrorCode =
  | "FETCH_INVALID_URL"
  | "FETCH_HTTP_STATUS"
  | "FETCH_DNS_FAILED"
  | "FETCH_CONNECTION_REFUSED"
  | "FETCH_TIMEOUT"
  | "FETCH_ABORTED"
  | "FETCH_NETWORK_ERROR";

export type WriteErrorCode =
  | "WRITE_DIR_FAILED"
  | "WRITE_PERMISSION_DENIED"
  | "WRITE_DISK_FULL"
  | "WRITE_FAILED";

export type ErrorCode =
  | InputErrorCode
  | FetchErrorCode
  | WriteErrorCode
  | "VALIDATION_INVALID_OPTION"
  | "VALIDATION_CONFIG_INVALID"
  | "UNKNOWN_ERROR";

export interface CLIErrorOptions {
  suggestion?: string;
  example?: string;
  details?: string;
  cause?: Error;
}

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly details?: string;

  constructor(code: ErrorCode, message: string, options?: CLIErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.details = options?.details;
  }
}

/**
 * The CSV could not be used at all. Fatal: raised before any download.
 */
export class InputError extends CLIError {
  declare readonly code: InputErrorCode;
  readonly path: string;

  constructor(
    code: InputErrorCode,
    path: string,
    message: string,
    options?: CLIErrorOptions
  ) {
    super(code, message, options);
    this.name = "InputError";
    this.path = path;
  }
}

/**
 * A single record's download failed. Recorded as an outcome; the batch goes on.
 */
export class FetchError extends CLIError {
  declare readonly code: FetchErrorCode;
  readonly url: string;
  /** HTTP status, present only for FETCH_HTTP_STATUS */
  readonly status?: number;

  constructor(
    code: FetchErrorCode,
    url: string,
    message: string,
    options?: CLIErrorOptions & { status?: number }
  ) {
    super(code, message, options);
    this.name = "FetchError";
    this.url = url;
    this.status = options?.status;
  }
}

/**
 * Persisting a record (or the manifest) failed.
 */
export class WriteError extends CLIError {
  declare readonly code: WriteErrorCode;
  readonly path: string;

  constructor(
    code: WriteErrorCode,
    path: string,
    message: string,
    options?: CLIErrorOptions
  ) {
    super(code, message, options);
    this.name = "WriteError";
    this.path = path;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}
