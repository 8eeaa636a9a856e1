import { PARSE_DEFAULTS } from "./constants";
import { envNumber } from "./env";

export interface ParsePolicy {
  /** Inputs above this many bytes are rejected before decoding */
  maxBytes: number;
  /** Deepest allowed container nesting; the root container is depth 1 */
  maxDepth: number;
  allowComments: boolean;
  allowTrailingCommas: boolean;
}

export type ParsePolicyInput = Partial<ParsePolicy> & {
  /** Human unit for `maxBytes` */
  maxMB?: number;
};

export const DEFAULT_PARSE_POLICY: ParsePolicy = {
  maxBytes: envNumber("JSONSCOPE_MAX_FILE_MB", PARSE_DEFAULTS.MAX_BYTES / (1024 * 1024)) * 1024 * 1024,
  maxDepth: Math.floor(envNumber("JSONSCOPE_MAX_DEPTH", PARSE_DEFAULTS.MAX_DEPTH)),
  allowComments: true,
  allowTrailingCommas: true,
};

/**
 * mergeParsePolicy()
 *  - canonical: maxBytes
 *  - human: maxMB
 * Values that are not positive finite numbers fall back to the defaults.
 */
export function mergeParsePolicy(input: ParsePolicyInput = {}): ParsePolicy {
  const merged: ParsePolicy = {
    maxBytes: input.maxBytes ?? DEFAULT_PARSE_POLICY.maxBytes,
    maxDepth: input.maxDepth ?? DEFAULT_PARSE_POLICY.maxDepth,
    allowComments: input.allowComments ?? DEFAULT_PARSE_POLICY.allowComments,
    allowTrailingCommas: input.allowTrailingCommas ?? DEFAULT_PARSE_POLICY.allowTrailingCommas,
  };

  if (typeof input.maxMB === "number") {
    merged.maxBytes = input.maxMB * 1024 * 1024;
  }

  if (!Number.isFinite(merged.maxBytes) || merged.maxBytes <= 0) {
    merged.maxBytes = DEFAULT_PARSE_POLICY.maxBytes;
  }
  if (!Number.isInteger(merged.maxDepth) || merged.maxDepth < 1) {
    merged.maxDepth = DEFAULT_PARSE_POLICY.maxDepth;
  }

  return merged;
}
