/**
 * Centralized constants for jsonscope
 * Avoids magic numbers scattered throughout codebase
 */

export const PARSE_DEFAULTS = {
  MAX_BYTES: 500 * 1024 * 1024,
  MAX_DEPTH: 100,
  /** File extensions offered by the open dialog */
  JSON_EXTENSIONS: [".json", ".jsonc", ".json5"],
} as const;

export const MATERIALIZE_DEFAULTS = {
  /** Children produced per expansion before the node is marked partial */
  CHILD_LIMIT: 1000,
  /** Children per batch between event-loop yields */
  BATCH_SIZE: 500,
  /** Leaf previews are cut here and suffixed with "..." */
  DISPLAY_MAX_CHARS: 100,
} as const;

export const LOAD_DEFAULTS = {
  MAX_CONCURRENT_LOADS: 3,
  TIMEOUT_MS: 10_000,
  /** Direct children warmed up after an expansion */
  PRELOAD_COUNT: 5,
} as const;

export const MEMORY_DEFAULTS = {
  WARNING_MB: 300,
  CRITICAL_MB: 500,
  SAMPLE_INTERVAL_SECONDS: 2,
  AGGRESSIVE_AFTER_WARNINGS: 3,
  AGGRESSIVE_COOLDOWN_MS: 60_000,
  REGULAR_CLEANUP_BATCH: 50,
} as const;

export const SEARCH_DEFAULTS = {
  MAX_RESULTS: 1000,
  REGEX_TIMEOUT_MS: 5000,
  NGRAM_SIZE: 3,
  /** Values longer than this also get n-gram entries */
  NGRAM_MIN_LENGTH: 10,
  CONTEXT_CHARS: 20,
  /** Content at or below this length is shown whole */
  CONTEXT_FULL_MAX: 50,
} as const;

export const CACHE_DEFAULTS = {
  /** Upper bound on path → node entries kept by the registry */
  REGISTRY_MAX_ENTRIES: 100_000,
} as const;

export const ANALYZER_DEFAULTS = {
  /** Nodes visited between event-loop yields */
  YIELD_EVERY: 50_000,
} as const;

export const SCORE_WEIGHTS = {
  key: 3,
  value: 2,
  path: 1,
  EXACT_BONUS: 2,
  SHALLOW_DEPTH: 5,
  SHALLOW_STEP: 0.1,
} as const;
