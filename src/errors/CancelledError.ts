import { JsonScopeError, ErrorCode, type ErrorContext } from "./JsonScopeError";

/**
 * Raised when an operation observes its abort signal. Not a user-visible
 * failure: callers treat it as an early exit.
 */
export class OperationCancelledError extends JsonScopeError {
  constructor(operation: string, context: Partial<ErrorContext> = {}) {
    super(`${operation} was cancelled`, ErrorCode.OPERATION_CANCELLED, { ...context, operation });
    this.name = "OperationCancelledError";
  }
}

export function isCancellation(error: unknown): boolean {
  if (error instanceof OperationCancelledError) return true;
  return error instanceof Error && error.name === "AbortError";
}
