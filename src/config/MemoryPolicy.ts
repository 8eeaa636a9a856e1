import { MEMORY_DEFAULTS } from "./constants";
import { envFlag, envNumber } from "./env";

/** Which figure from `process.memoryUsage()` is compared with the thresholds. */
export type MemoryMetric = "heapUsed" | "rss";

export interface MemoryPolicy {
  enabled: boolean;
  warningBytes: number;
  criticalBytes: number;
  sampleIntervalSeconds: number;
  aggressiveAfterWarnings: number;
  aggressiveCooldownMs: number;
  regularCleanupBatch: number;
  metric: MemoryMetric;
}

export type MemoryPolicyInput = Partial<MemoryPolicy> & {
  warningMB?: number;
  criticalMB?: number;
};

const MB = 1024 * 1024;

export const DEFAULT_MEMORY_POLICY: MemoryPolicy = {
  enabled: envFlag("JSONSCOPE_MEMORY_MONITOR", true),
  warningBytes: envNumber("JSONSCOPE_MEMORY_WARNING_MB", MEMORY_DEFAULTS.WARNING_MB) * MB,
  criticalBytes: envNumber("JSONSCOPE_MEMORY_CRITICAL_MB", MEMORY_DEFAULTS.CRITICAL_MB) * MB,
  sampleIntervalSeconds: Math.floor(envNumber("JSONSCOPE_MEMORY_SAMPLE_SECONDS", MEMORY_DEFAULTS.SAMPLE_INTERVAL_SECONDS)),
  aggressiveAfterWarnings: MEMORY_DEFAULTS.AGGRESSIVE_AFTER_WARNINGS,
  aggressiveCooldownMs: MEMORY_DEFAULTS.AGGRESSIVE_COOLDOWN_MS,
  regularCleanupBatch: MEMORY_DEFAULTS.REGULAR_CLEANUP_BATCH,
  metric: "heapUsed",
};

/**
 * mergeMemoryPolicy()
 *  - canonical: warningBytes, criticalBytes
 *  - human: warningMB, criticalMB
 * The critical threshold is kept strictly above the warning threshold.
 * Cron's seconds field tops out at 59, so the interval is clamped to 1..59.
 */
export function mergeMemoryPolicy(input: MemoryPolicyInput = {}): MemoryPolicy {
  const merged: MemoryPolicy = {
    enabled: input.enabled ?? DEFAULT_MEMORY_POLICY.enabled,
    warningBytes: input.warningBytes ?? DEFAULT_MEMORY_POLICY.warningBytes,
    criticalBytes: input.criticalBytes ?? DEFAULT_MEMORY_POLICY.criticalBytes,
    sampleIntervalSeconds: input.sampleIntervalSeconds ?? DEFAULT_MEMORY_POLICY.sampleIntervalSeconds,
    aggressiveAfterWarnings: input.aggressiveAfterWarnings ?? DEFAULT_MEMORY_POLICY.aggressiveAfterWarnings,
    aggressiveCooldownMs: input.aggressiveCooldownMs ?? DEFAULT_MEMORY_POLICY.aggressiveCooldownMs,
    regularCleanupBatch: input.regularCleanupBatch ?? DEFAULT_MEMORY_POLICY.regularCleanupBatch,
    metric: input.metric === "rss" ? "rss" : input.metric === "heapUsed" ? "heapUsed" : DEFAULT_MEMORY_POLICY.metric,
  };

  if (typeof input.warningMB === "number") merged.warningBytes = input.warningMB * MB;
  if (typeof input.criticalMB === "number") merged.criticalBytes = input.criticalMB * MB;

  if (!Number.isFinite(merged.warningBytes) || merged.warningBytes <= 0) {
    merged.warningBytes = DEFAULT_MEMORY_POLICY.warningBytes;
  }
  if (!Number.isFinite(merged.criticalBytes) || merged.criticalBytes <= merged.warningBytes) {
    merged.criticalBytes = Math.max(DEFAULT_MEMORY_POLICY.criticalBytes, merged.warningBytes * 2);
  }
  if (!Number.isInteger(merged.sampleIntervalSeconds) || merged.sampleIntervalSeconds < 1) {
    merged.sampleIntervalSeconds = DEFAULT_MEMORY_POLICY.sampleIntervalSeconds;
  }
  merged.sampleIntervalSeconds = Math.min(merged.sampleIntervalSeconds, 59);
  if (!Number.isInteger(merged.aggressiveAfterWarnings) || merged.aggressiveAfterWarnings < 1) {
    merged.aggressiveAfterWarnings = DEFAULT_MEMORY_POLICY.aggressiveAfterWarnings;
  }
  if (!Number.isFinite(merged.aggressiveCooldownMs) || merged.aggressiveCooldownMs < 0) {
    merged.aggressiveCooldownMs = DEFAULT_MEMORY_POLICY.aggressiveCooldownMs;
  }
  if (!Number.isInteger(merged.regularCleanupBatch) || merged.regularCleanupBatch < 1) {
    merged.regularCleanupBatch = DEFAULT_MEMORY_POLICY.regularCleanupBatch;
  }

  return merged;
}
