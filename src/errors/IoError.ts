import { JsonScopeError, ErrorCode, type ErrorContext } from "./JsonScopeError";

/**
 * Error for reading source files and writing saved output.
 */
export class JsonIoError extends JsonScopeError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.IO_READ_FAILED,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message, code, context, options);
    this.name = "JsonIoError";
  }

  static notFound(filePath: string, context: Partial<ErrorContext> = {}) {
    return new JsonIoError(
      `File not found: ${filePath}`,
      ErrorCode.IO_NOT_FOUND,
      { operation: "open", ...context, filePath },
      { isRetryable: false }
    );
  }

  static readFailed(filePath: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new JsonIoError(
      `Failed to read file: ${filePath}`,
      ErrorCode.IO_READ_FAILED,
      { operation: "open", ...context, filePath },
      { cause, isRetryable: true }
    );
  }

  static writeFailed(filePath: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new JsonIoError(
      `Failed to write file: ${filePath}`,
      ErrorCode.IO_WRITE_FAILED,
      { operation: "save", ...context, filePath },
      { cause, isRetryable: true }
    );
  }
}
