import { JsonScopeError, ErrorCode, type ErrorContext } from "./JsonScopeError";

/**
 * Error for paths that no longer resolve against the document.
 * Local to the node being expanded; the node can be retried.
 */
export class JsonResolveError extends JsonScopeError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.RESOLVE_PATH_NOT_FOUND,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message, code, context, {
      cause: options?.cause,
      isRetryable: options?.isRetryable ?? true,
    });
    this.name = "JsonResolveError";
  }

  static pathNotFound(path: string, context: Partial<ErrorContext> = {}) {
    return new JsonResolveError(
      `Path ${path} does not resolve in the document`,
      ErrorCode.RESOLVE_PATH_NOT_FOUND,
      { operation: "resolve", ...context, path }
    );
  }

  static notAContainer(path: string, context: Partial<ErrorContext> = {}) {
    return new JsonResolveError(
      `Value at ${path} has no children`,
      ErrorCode.RESOLVE_NOT_A_CONTAINER,
      { operation: "resolve", ...context, path },
      { isRetryable: false }
    );
  }

  static invalidPathExpression(expression: string, reason: string, context: Partial<ErrorContext> = {}) {
    return new JsonResolveError(
      `Invalid path expression "${expression}": ${reason}`,
      ErrorCode.RESOLVE_INVALID_EXPRESSION,
      { operation: "parsePath", ...context, expression },
      { isRetryable: false }
    );
  }
}
