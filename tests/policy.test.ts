import { describe, it, expect } from "vitest";
import { DEFAULT_PARSE_POLICY, mergeParsePolicy } from "../src/config/ParsePolicy";
import { DEFAULT_LOAD_POLICY, mergeLoadPolicy } from "../src/config/LoadPolicy";
import { DEFAULT_MEMORY_POLICY, mergeMemoryPolicy } from "../src/config/MemoryPolicy";
import { DEFAULT_SEARCH_POLICY, mergeSearchPolicy } from "../src/config/SearchPolicy";
import { formatByteSize } from "../src/utils/format";

const MB = 1024 * 1024;

describe("ParsePolicy", () => {
  describe("DEFAULT_PARSE_POLICY", () => {
    it("should cap documents at 500MB", () => {
      expect(DEFAULT_PARSE_POLICY.maxBytes).toBe(500 * MB);
    });

    it("should cap nesting at 100 levels", () => {
      expect(DEFAULT_PARSE_POLICY.maxDepth).toBe(100);
    });
  });

  describe("mergeParsePolicy", () => {
    it("should accept the size in megabytes", () => {
      expect(mergeParsePolicy({ maxMB: 2 }).maxBytes).toBe(2 * MB);
    });

    it("should fall back for unusable values", () => {
      const policy = mergeParsePolicy({ maxBytes: -1, maxDepth: 2.5 });

      expect(policy.maxBytes).toBe(DEFAULT_PARSE_POLICY.maxBytes);
      expect(policy.maxDepth).toBe(DEFAULT_PARSE_POLICY.maxDepth);
    });
  });
});

describe("LoadPolicy", () => {
  it("should default to three concurrent loads and a ten second timeout", () => {
    expect(DEFAULT_LOAD_POLICY.maxConcurrentLoads).toBe(3);
    expect(DEFAULT_LOAD_POLICY.loadTimeoutMs).toBe(10_000);
    expect(DEFAULT_LOAD_POLICY.childLimit).toBe(1000);
    expect(DEFAULT_LOAD_POLICY.timeoutBehavior).toBe("detach");
  });

  it("should accept the timeout in seconds", () => {
    expect(mergeLoadPolicy({ timeoutSeconds: 2 }).loadTimeoutMs).toBe(2000);
  });

  it("should ignore unknown timeout behaviors and bad counts", () => {
    const policy = mergeLoadPolicy({ maxConcurrentLoads: 0, batchSize: 1.5, timeoutBehavior: "cancel" });

    expect(policy.maxConcurrentLoads).toBe(3);
    expect(policy.batchSize).toBe(DEFAULT_LOAD_POLICY.batchSize);
    expect(policy.timeoutBehavior).toBe("cancel");
  });
});

describe("MemoryPolicy", () => {
  it("should default to 300MB warning and 500MB critical thresholds", () => {
    expect(DEFAULT_MEMORY_POLICY.warningBytes).toBe(300 * MB);
    expect(DEFAULT_MEMORY_POLICY.criticalBytes).toBe(500 * MB);
    expect(DEFAULT_MEMORY_POLICY.sampleIntervalSeconds).toBe(2);
  });

  it("should accept thresholds in megabytes", () => {
    const policy = mergeMemoryPolicy({ warningMB: 100, criticalMB: 150 });

    expect(policy.warningBytes).toBe(100 * MB);
    expect(policy.criticalBytes).toBe(150 * MB);
  });

  it("should keep critical above warning", () => {
    const policy = mergeMemoryPolicy({ warningMB: 400, criticalMB: 200 });

    expect(policy.warningBytes).toBe(400 * MB);
    expect(policy.criticalBytes).toBe(800 * MB);
  });

  it("should clamp the sampling interval to the cron seconds field", () => {
    expect(mergeMemoryPolicy({ sampleIntervalSeconds: 90 }).sampleIntervalSeconds).toBe(59);
    expect(mergeMemoryPolicy({ sampleIntervalSeconds: 0 }).sampleIntervalSeconds).toBe(2);
  });
});

describe("SearchPolicy", () => {
  it("should keep valid overrides and drop the rest", () => {
    const policy = mergeSearchPolicy({ maxResults: 10, ngramSize: 0, contextChars: -4 });

    expect(policy.maxResults).toBe(10);
    expect(policy.ngramSize).toBe(DEFAULT_SEARCH_POLICY.ngramSize);
    expect(policy.contextChars).toBe(20);
  });
});

describe("formatByteSize", () => {
  it("should use binary units with at most two decimals", () => {
    expect(formatByteSize(0)).toBe("0 B");
    expect(formatByteSize(512)).toBe("512 B");
    expect(formatByteSize(1536)).toBe("1.5 KB");
    expect(formatByteSize(5 * MB)).toBe("5 MB");
    expect(formatByteSize(1234567)).toBe("1.18 MB");
  });
});
