export class LazyServeError extends Error {
  constructor(
    message: string,
    public code: string,
  ) {
    super(message);
    this.name = "LazyServeError";
  }
}

/**
 * Error codes for programmatic error handling.
 * All error codes are uppercase snake_case.
 */
export const ErrorCodes = {
  CONFIG_ERROR: "CONFIG_ERROR",
  INVALID_JSON: "INVALID_JSON",
  SCHEMA_VALIDATION: "SCHEMA_VALIDATION",
  FILE_READ_ERROR: "FILE_READ_ERROR",
  SERVE_DIR_NOT_FOUND: "SERVE_DIR_NOT_FOUND",
  SERVER_START_FAILED: "SERVER_START_FAILED",
  INTERRUPTED: "INTERRUPTED",
  WRAPPED_ERROR: "WRAPPED_ERROR",
} as const;

export class ConfigError extends LazyServeError {
  constructor(message: string) {
    super(message, ErrorCodes.CONFIG_ERROR);
    this.name = "ConfigError";
  }
}

export class InvalidJsonError extends LazyServeError {
  constructor(message: string) {
    super(message, ErrorCodes.INVALID_JSON);
    this.name = "InvalidJsonError";
  }
}

export class SchemaValidationError extends LazyServeError {
  constructor(message: string) {
    super(message, ErrorCodes.SCHEMA_VALIDATION);
    this.name = "SchemaValidationError";
  }
}

/**
 * Thrown when a file exists but cannot be read due to permission or I/O errors.
 * A missing file is reported separately by the callers that care.
 */
export class FileReadError extends LazyServeError {
  constructor(
    public readonly filePath: string,
    public readonly cause: Error,
  ) {
    super(
      `Cannot read ${filePath}: ${cause.message}`,
      ErrorCodes.FILE_READ_ERROR,
    );
    this.name = "FileReadError";
  }
}

export class ServeDirNotFoundError extends LazyServeError {
  constructor(public readonly dir: string) {
    super(`Serve directory does not exist: ${dir}`, ErrorCodes.SERVE_DIR_NOT_FOUND);
    this.name = "ServeDirNotFoundError";
  }
}

export class ServerStartError extends LazyServeError {
  constructor(message: string) {
    super(message, ErrorCodes.SERVER_START_FAILED);
    this.name = "ServerStartError";
  }
}

export class InterruptedError extends LazyServeError {
  constructor() {
    super("Operation interrupted", ErrorCodes.INTERRUPTED);
    this.name = "InterruptedError";
  }
}

export function isLazyServeError(error: unknown): error is LazyServeError {
  return error instanceof LazyServeError;
}

export function toExitCode(error: unknown): number {
  if (error === null || error === undefined) {
    return 0;
  }

  if (error instanceof InterruptedError) {
    return 130;
  }

  return 1;
}

export function wrapError(error: unknown, context: string): LazyServeError {
  if (error instanceof LazyServeError) {
    return new LazyServeError(`${context}: ${error.message}`, error.code);
  }

  if (error instanceof Error) {
    return new LazyServeError(
      `${context}: ${error.message}`,
      ErrorCodes.WRAPPED_ERROR,
    );
  }

  return new LazyServeError(
    `${context}: ${String(error)}`,
    ErrorCodes.WRAPPED_ERROR,
  );
}
