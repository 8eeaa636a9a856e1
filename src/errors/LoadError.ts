import { JsonScopeError, ErrorCode, type ErrorContext } from "./JsonScopeError";

/**
 * Error for node expansion failures. Per-node and retryable.
 */
export class JsonLoadError extends JsonScopeError {
  public readonly nodePath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.LOAD_FAILED,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message, code, context, {
      cause: options?.cause,
      isRetryable: options?.isRetryable ?? true,
    });
    this.name = "JsonLoadError";
    this.nodePath = context.path;
  }

  static timeout(path: string, timeoutMs: number, context: Partial<ErrorContext> = {}) {
    return new JsonLoadError(
      `Loading children of ${path} timed out after ${timeoutMs}ms`,
      ErrorCode.LOAD_TIMEOUT,
      { operation: "load", ...context, path, timeoutMs }
    );
  }

  static failed(path: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new JsonLoadError(
      `Failed to load children of ${path}`,
      ErrorCode.LOAD_FAILED,
      { operation: "load", ...context, path },
      { cause }
    );
  }

  static documentClosed(context: Partial<ErrorContext> = {}) {
    return new JsonLoadError(
      "Document was closed or replaced",
      ErrorCode.LOAD_DOCUMENT_CLOSED,
      { operation: "load", ...context },
      { isRetryable: false }
    );
  }
}
