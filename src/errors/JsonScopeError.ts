/**
 * Base error class for all jsonscope errors.
 * Provides error codes, operation context, and structured metadata.
 */

export enum ErrorCode {
  // Parse / open errors (1xxx)
  PARSE_MALFORMED = 1001,
  PARSE_DEPTH_EXCEEDED = 1002,
  PARSE_SIZE_EXCEEDED = 1003,
  PARSE_EMPTY = 1004,
  PARSE_INVALID_ENCODING = 1005,

  // Resolve errors (2xxx)
  RESOLVE_PATH_NOT_FOUND = 2001,
  RESOLVE_NOT_A_CONTAINER = 2002,
  RESOLVE_INVALID_EXPRESSION = 2003,

  // Load errors (3xxx)
  LOAD_TIMEOUT = 3001,
  LOAD_FAILED = 3002,
  LOAD_DOCUMENT_CLOSED = 3003,

  // Search errors (4xxx)
  SEARCH_TIMEOUT = 4001,
  SEARCH_INVALID_PATTERN = 4002,

  // Memory monitor errors (5xxx)
  MEMORY_SAMPLE_FAILED = 5001,
  MEMORY_SCHEDULE_INVALID = 5002,

  // I/O errors (6xxx)
  IO_NOT_FOUND = 6001,
  IO_READ_FAILED = 6002,
  IO_WRITE_FAILED = 6003,

  // General errors (9xxx)
  UNKNOWN = 9999,
  INTERNAL = 9998,
  OPERATION_CANCELLED = 9001,
}

export interface ErrorContext {
  operation: string;
  path?: string;
  filePath?: string;
  query?: string;
  offset?: number;
  timestamp?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  code: ErrorCode;
  message: string;
  context: ErrorContext;
  cause?: string;
  stack?: string;
}

/**
 * Base error class for jsonscope.
 * All library-specific errors should extend this class.
 */
export class JsonScopeError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;
  public readonly isRetryable: boolean;
  public readonly timestamp: string;
  declare readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message);
    this.name = "JsonScopeError";
    this.code = code;
    this.cause = options?.cause;
    this.timestamp = new Date().toISOString();
    this.isRetryable = options?.isRetryable ?? false;
    this.context = {
      operation: context.operation || "unknown",
      timestamp: this.timestamp,
      ...context,
    };

    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or transmission.
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
      stack: this.stack,
    };
  }

  /**
   * Message suitable for a status bar or dialog.
   */
  toUserMessage(): string {
    return this.message;
  }

  /**
   * Detailed single-line message for logging.
   */
  toLogMessage(): string {
    const parts = [
      `[${this.name}]`,
      `Code: ${this.code}`,
      `Op: ${this.context.operation}`,
      this.message,
    ];
    if (this.context.path !== undefined) parts.push(`Path: ${this.context.path}`);
    if (this.context.filePath) parts.push(`File: ${this.context.filePath}`);
    if (this.cause instanceof Error) parts.push(`Cause: ${this.cause.message}`);
    return parts.join(" | ");
  }
}

/**
 * Helper to wrap unknown errors in JsonScopeError.
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.UNKNOWN,
  context: Partial<ErrorContext> = {}
): JsonScopeError {
  if (error instanceof JsonScopeError) {
    return new JsonScopeError(error.message, error.code, {
      ...error.context,
      ...context,
    }, { cause: error.cause, isRetryable: error.isRetryable });
  }

  if (error instanceof Error) {
    return new JsonScopeError(error.message, code, context, { cause: error });
  }

  return new JsonScopeError(
    typeof error === "string" ? error : "An unknown error occurred",
    code,
    context
  );
}

/**
 * Type guard for JsonScopeError.
 */
export function isJsonScopeError(error: unknown): error is JsonScopeError {
  return error instanceof JsonScopeError;
}

/**
 * Get error code from any error type.
 */
export function getErrorCode(error: unknown): ErrorCode {
  if (isJsonScopeError(error)) return error.code;
  return ErrorCode.UNKNOWN;
}
