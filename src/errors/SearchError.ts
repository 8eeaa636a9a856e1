import { JsonScopeError, ErrorCode, type ErrorContext } from "./JsonScopeError";

/**
 * Error surfaced inline by the search UI. Never affects tree state.
 */
export class JsonSearchError extends JsonScopeError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SEARCH_INVALID_PATTERN,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { cause: options?.cause, isRetryable: false });
    this.name = "JsonSearchError";
  }

  static timeout(query: string, timeoutMs: number, context: Partial<ErrorContext> = {}) {
    return new JsonSearchError(
      `Search timed out after ${timeoutMs}ms, try a simpler pattern`,
      ErrorCode.SEARCH_TIMEOUT,
      { operation: "search", ...context, query, timeoutMs }
    );
  }

  static invalidPattern(pattern: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new JsonSearchError(
      `Invalid regular expression: ${cause?.message ?? pattern}`,
      ErrorCode.SEARCH_INVALID_PATTERN,
      { operation: "search", ...context, query: pattern },
      { cause }
    );
  }
}
