import { setImmediate as nextTurn } from "node:timers/promises";
import { OperationCancelledError, type ErrorContext } from "../errors";

/**
 * Throw `OperationCancelledError` when the signal has fired.
 * Long-running loops call this at their batch boundaries.
 */
export function throwIfAborted(
  signal: AbortSignal | undefined,
  operation: string,
  context: Partial<ErrorContext> = {}
): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(operation, context);
  }
}

/** Let queued I/O and timers run before the next batch. */
export async function yieldToEventLoop(): Promise<void> {
  await nextTurn();
}
