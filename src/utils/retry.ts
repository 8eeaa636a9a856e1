import { isJsonScopeError } from "../errors";
import { isCancellation } from "../errors/CancelledError";
import { logger } from "./logger";

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  retryableErrors?: number[]; // Error codes to retry
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 2000,
  backoffMultiplier: 2,
};

/** errno codes that usually clear up on their own (locked file, descriptor exhaustion). */
const TRANSIENT_FS_CODES = new Set(["EBUSY", "EMFILE", "ENFILE", "EAGAIN", "EPERM"]);

/**
 * Execute a function with exponential backoff retry.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  config: Partial<RetryConfig> = {},
  operationName: string = "operation"
): Promise<T> {
  const cfg = { ...DEFAULT_RETRY_CONFIG, ...config };
  let lastError: unknown;
  let delay = cfg.initialDelayMs;

  for (let attempt = 1; attempt <= cfg.maxAttempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;

      const isRetryable = shouldRetry(error, cfg.retryableErrors);

      if (!isRetryable || attempt === cfg.maxAttempts) {
        if (attempt > 1) {
          logger.error(`${operationName} failed after ${attempt} attempts`, {
            attempt,
            maxAttempts: cfg.maxAttempts,
          }, error);
        }
        throw error;
      }

      logger.warn(`${operationName} failed, retrying in ${delay}ms`, {
        attempt,
        maxAttempts: cfg.maxAttempts,
        delay,
      }, error);

      await sleep(delay);
      delay = Math.min(delay * cfg.backoffMultiplier, cfg.maxDelayMs);
    }
  }

  throw lastError instanceof Error ? lastError : new Error(`${operationName} failed`);
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Determine if an error should be retried.
 */
export function shouldRetry(error: unknown, retryableCodes?: number[]): boolean {
  if (isCancellation(error)) return false;

  if (isJsonScopeError(error)) {
    if (error.isRetryable) return true;
    if (retryableCodes && retryableCodes.includes(error.code)) return true;
    return false;
  }

  const code = errnoCode(error);
  if (code) return TRANSIENT_FS_CODES.has(code);

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("resource busy") ||
      message.includes("too many open files") ||
      message.includes("temporarily unavailable")
    );
  }

  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry configuration presets.
 */
export const RetryPresets = {
  /** Local file reads: a locked or busy file usually frees up quickly */
  fileRead: {
    maxAttempts: 3,
    initialDelayMs: 100,
    maxDelayMs: 1000,
    backoffMultiplier: 2,
  } satisfies RetryConfig,

  /** Saving output next to a file another program may be holding */
  fileWrite: {
    maxAttempts: 4,
    initialDelayMs: 200,
    maxDelayMs: 2000,
    backoffMultiplier: 2,
  } satisfies RetryConfig,
};
