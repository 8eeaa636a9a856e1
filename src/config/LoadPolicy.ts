import { LOAD_DEFAULTS, MATERIALIZE_DEFAULTS } from "./constants";
import { envNumber } from "./env";

/**
 * What happens to a load whose caller stopped waiting.
 *  - detach: the caller gets a timeout error, the work finishes and fills the node
 *  - cancel: the work is aborted at its next batch and the node goes back to idle
 */
export type TimeoutBehavior = "detach" | "cancel";

export interface LoadPolicy {
  maxConcurrentLoads: number;
  loadTimeoutMs: number;
  batchSize: number;
  childLimit: number;
  timeoutBehavior: TimeoutBehavior;
}

export type LoadPolicyInput = Partial<LoadPolicy> & {
  timeoutSeconds?: number;
};

export const DEFAULT_LOAD_POLICY: LoadPolicy = {
  maxConcurrentLoads: Math.floor(envNumber("JSONSCOPE_MAX_CONCURRENT_LOADS", LOAD_DEFAULTS.MAX_CONCURRENT_LOADS)),
  loadTimeoutMs: LOAD_DEFAULTS.TIMEOUT_MS,
  batchSize: MATERIALIZE_DEFAULTS.BATCH_SIZE,
  childLimit: MATERIALIZE_DEFAULTS.CHILD_LIMIT,
  timeoutBehavior: "detach",
};

function positiveInt(value: number, fallback: number): number {
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

export function mergeLoadPolicy(input: LoadPolicyInput = {}): LoadPolicy {
  const merged: LoadPolicy = { ...DEFAULT_LOAD_POLICY };
  if (input.maxConcurrentLoads !== undefined) merged.maxConcurrentLoads = input.maxConcurrentLoads;
  if (input.loadTimeoutMs !== undefined) merged.loadTimeoutMs = input.loadTimeoutMs;
  if (input.batchSize !== undefined) merged.batchSize = input.batchSize;
  if (input.childLimit !== undefined) merged.childLimit = input.childLimit;
  if (input.timeoutBehavior === "detach" || input.timeoutBehavior === "cancel") {
    merged.timeoutBehavior = input.timeoutBehavior;
  }

  if (typeof input.timeoutSeconds === "number") {
    merged.loadTimeoutMs = input.timeoutSeconds * 1000;
  }

  merged.maxConcurrentLoads = positiveInt(merged.maxConcurrentLoads, DEFAULT_LOAD_POLICY.maxConcurrentLoads);
  merged.batchSize = positiveInt(merged.batchSize, DEFAULT_LOAD_POLICY.batchSize);
  merged.childLimit = positiveInt(merged.childLimit, DEFAULT_LOAD_POLICY.childLimit);
  if (!Number.isFinite(merged.loadTimeoutMs) || merged.loadTimeoutMs <= 0) {
    merged.loadTimeoutMs = DEFAULT_LOAD_POLICY.loadTimeoutMs;
  }

  return merged;
}
