import { SEARCH_DEFAULTS } from "./constants";

export interface SearchPolicy {
  maxResults: number;
  regexTimeoutMs: number;
  ngramSize: number;
  ngramMinLength: number;
  contextChars: number;
  minQueryLength: number;
}

export const DEFAULT_SEARCH_POLICY: SearchPolicy = {
  maxResults: SEARCH_DEFAULTS.MAX_RESULTS,
  regexTimeoutMs: SEARCH_DEFAULTS.REGEX_TIMEOUT_MS,
  ngramSize: SEARCH_DEFAULTS.NGRAM_SIZE,
  ngramMinLength: SEARCH_DEFAULTS.NGRAM_MIN_LENGTH,
  contextChars: SEARCH_DEFAULTS.CONTEXT_CHARS,
  minQueryLength: 1,
};

const POLICY_KEYS: ReadonlyArray<keyof SearchPolicy> = [
  "maxResults",
  "regexTimeoutMs",
  "ngramSize",
  "ngramMinLength",
  "contextChars",
  "minQueryLength",
];

export function mergeSearchPolicy(input: Partial<SearchPolicy> = {}): SearchPolicy {
  const merged: SearchPolicy = { ...DEFAULT_SEARCH_POLICY };
  for (const key of POLICY_KEYS) {
    const value = input[key];
    if (typeof value === "number" && Number.isFinite(value) && value >= 0) {
      merged[key] = value;
    }
  }
  if (merged.maxResults < 1) merged.maxResults = DEFAULT_SEARCH_POLICY.maxResults;
  if (merged.ngramSize < 1) merged.ngramSize = DEFAULT_SEARCH_POLICY.ngramSize;
  if (merged.minQueryLength < 1) merged.minQueryLength = 1;
  return merged;
}
