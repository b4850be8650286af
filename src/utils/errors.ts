/**
 * Standard error classes for schema-mirror
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  SCHEMA_ERROR = "SCHEMA_ERROR",
  CONNECTION_ERROR = "CONNECTION_ERROR",
  UNSUPPORTED_BACKEND = "UNSUPPORTED_BACKEND",
  FILE_IO_ERROR = "FILE_IO_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export class SchemaMirrorError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "SchemaMirrorError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

/**
 * Invalid `MirrorConfig` values or unreadable configuration files.
 */
export class ConfigError extends SchemaMirrorError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

/**
 * A source schema declaration that cannot be turned into models.
 */
export class SchemaError extends SchemaMirrorError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.SCHEMA_ERROR, message, details, options);
    this.name = "SchemaError";
  }
}

/**
 * Target connection bootstrap failed. The original failure is the `cause`.
 */
export class ConnectionError extends SchemaMirrorError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONNECTION_ERROR, message, details, options);
    this.name = "ConnectionError";
  }
}

/**
 * A configured database engine has no target driver.
 */
export class UnsupportedBackendError extends SchemaMirrorError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.UNSUPPORTED_BACKEND, message, details, options);
    this.name = "UnsupportedBackendError";
  }
}

export class FileIOError extends SchemaMirrorError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

/**
 * Best-effort message extraction for values caught as `unknown`.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
