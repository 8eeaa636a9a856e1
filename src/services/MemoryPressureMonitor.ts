/**
 * MemoryPressureMonitor: samples process memory on a cron schedule and
 * evicts the children of collapsed nodes when usage crosses the thresholds.
 *
 * The decision step is the pure {@link evaluateMemorySample}; the class
 * only samples, applies the chosen cleanup and reports.
 */

import * as cron from "node-cron";

import { ErrorCode, JsonScopeError } from "../errors";
import { mergeMemoryPolicy, type MemoryPolicy, type MemoryPolicyInput } from "../config/MemoryPolicy";
import { formatByteSize } from "../utils/format";
import { createLogger } from "../utils/logger";
import type { JsonPath } from "../document/JsonPath";
import type { JsonScopeEventBus } from "../events";
import type { LazyNode } from "../tree/LazyNode";
import type { LazyTree } from "../tree/LazyTree";

const log = createLogger({ component: "MemoryPressureMonitor" });

export type PressureLevel = "normal" | "warning" | "critical";

export type CleanupAction = "none" | "regular" | "aggressive" | "emergency";

export interface MemorySample {
  heapUsedBytes: number;
  residentBytes: number;
}

export interface MonitorState {
  level: PressureLevel;
  consecutiveWarnings: number;
  /** When the last aggressive cleanup ran, ms since epoch */
  lastAggressiveAt: number | null;
}

export interface MemoryDecision {
  state: MonitorState;
  level: PressureLevel;
  action: CleanupAction;
}

export interface MemoryStatus {
  level: PressureLevel;
  residentBytes: number;
  heapUsedBytes: number;
  /** Entries in the path → node registry */
  cacheSize: number;
  materializedNodes: number;
  consecutiveWarnings: number;
  cleanupCount: number;
}

export interface CleanupReport {
  action: CleanupAction;
  evictedNodes: number;
  droppedNodes: number;
}

export interface MonitorDeps {
  events?: JsonScopeEventBus;
  sampler?: () => MemorySample;
  /** Asked to reclaim memory after an emergency cleanup */
  reclaim?: () => void;
  now?: () => number;
}

export const INITIAL_MONITOR_STATE: Readonly<MonitorState> = {
  level: "normal",
  consecutiveWarnings: 0,
  lastAggressiveAt: null,
};

/**
 * Classify one sample and pick the cleanup for it.
 *
 * Warnings in a row escalate to an aggressive cleanup once the count
 * reaches `aggressiveAfterWarnings`, at most once per cooldown. The count
 * restarts after each aggressive cleanup and whenever usage drops below
 * the warning threshold.
 */
export function evaluateMemorySample(
  state: MonitorState,
  sample: MemorySample,
  policy: MemoryPolicy,
  now: number
): MemoryDecision {
  const used = policy.metric === "rss" ? sample.residentBytes : sample.heapUsedBytes;

  if (used > policy.criticalBytes) {
    return {
      state: { ...state, level: "critical", consecutiveWarnings: state.consecutiveWarnings + 1 },
      level: "critical",
      action: "emergency",
    };
  }

  if (used > policy.warningBytes) {
    const consecutiveWarnings = state.consecutiveWarnings + 1;
    const cooledDown = state.lastAggressiveAt === null || now - state.lastAggressiveAt >= policy.aggressiveCooldownMs;
    if (consecutiveWarnings >= policy.aggressiveAfterWarnings && cooledDown) {
      return {
        state: { level: "warning", consecutiveWarnings: 0, lastAggressiveAt: now },
        level: "warning",
        action: "aggressive",
      };
    }
    return {
      state: { ...state, level: "warning", consecutiveWarnings },
      level: "warning",
      action: "regular",
    };
  }

  return {
    state: { ...state, level: "normal", consecutiveWarnings: 0 },
    level: "normal",
    action: "none",
  };
}

export function processMemorySample(): MemorySample {
  const usage = process.memoryUsage();
  return { heapUsedBytes: usage.heapUsed, residentBytes: usage.rss };
}

function hostReclaim(): void {
  const gc: unknown = Reflect.get(globalThis, "gc");
  if (typeof gc === "function") gc();
}

/**
 * Topmost nodes whose children may be dropped: loaded, collapsed, not
 * loading and not on the way to the focused node. Their descendants go
 * with them, so the walk does not descend into a candidate. A subtree
 * with a load running inside it is searched below instead.
 */
export function findEvictionCandidates(tree: LazyTree): LazyNode[] {
  const candidates: LazyNode[] = [];
  const stack: LazyNode[] = [tree.root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (!node.children) continue;

    if (node.loaded && !node.expanded && !tree.isFocusProtected(node) && !tree.hasLoadingDescendant(node)) {
      candidates.push(node);
      continue;
    }
    for (const child of node.children) stack.push(child);
  }
  return candidates;
}

export class MemoryPressureMonitor {
  readonly policy: MemoryPolicy;
  private tree: LazyTree | null;
  private task: cron.ScheduledTask | null = null;
  private state: MonitorState = INITIAL_MONITOR_STATE;
  private lastSample: MemorySample | null = null;
  private cleanupCount = 0;
  private readonly events?: JsonScopeEventBus;
  private readonly sampler: () => MemorySample;
  private readonly reclaim: () => void;
  private readonly now: () => number;

  constructor(tree: LazyTree | null, policy: MemoryPolicyInput = {}, deps: MonitorDeps = {}) {
    this.tree = tree;
    this.policy = mergeMemoryPolicy(policy);
    this.events = deps.events;
    this.sampler = deps.sampler ?? processMemorySample;
    this.reclaim = deps.reclaim ?? hostReclaim;
    this.now = deps.now ?? Date.now;
  }

  /** Point the monitor at a new tree after the document is replaced. */
  setTree(tree: LazyTree | null): void {
    this.tree = tree;
    this.state = INITIAL_MONITOR_STATE;
  }

  get cronExpression(): string {
    return `*/${this.policy.sampleIntervalSeconds} * * * * *`;
  }

  get running(): boolean {
    return this.task !== null;
  }

  /**
   * Begin periodic sampling. Returns false when monitoring is disabled.
   */
  start(): boolean {
    if (this.task) return true;
    if (!this.policy.enabled) {
      log.info("Memory monitor is disabled");
      return false;
    }

    const expression = this.cronExpression;
    if (!cron.validate(expression)) {
      throw new JsonScopeError(
        `Invalid sampling schedule: ${expression}`,
        ErrorCode.MEMORY_SCHEDULE_INVALID,
        { operation: "startMonitor", expression }
      );
    }

    this.task = cron.schedule(expression, () => {
      this.tick();
    });

    log.info("Memory monitor started", {
      schedule: expression,
      warning: formatByteSize(this.policy.warningBytes),
      critical: formatByteSize(this.policy.criticalBytes),
    });
    return true;
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      log.info("Memory monitor stopped");
    }
  }

  /**
   * Take one sample, apply the resulting cleanup and report. A failed
   * sample is logged and the cycle skipped; `null` is returned.
   */
  tick(): MemoryStatus | null {
    let sample: MemorySample;
    try {
      sample = this.sampler();
    } catch (error) {
      log.warn(
        "Memory sample failed, skipping this cycle",
        { code: ErrorCode.MEMORY_SAMPLE_FAILED },
        error
      );
      return null;
    }

    this.lastSample = sample;
    const previous = this.state.level;
    const decision = evaluateMemorySample(this.state, sample, this.policy, this.now());
    this.state = decision.state;

    if (decision.action !== "none") {
      this.cleanup(decision.action);
    }

    const status = this.buildStatus(sample);
    if (decision.level !== previous) {
      log.info("Memory pressure level changed", {
        previous,
        level: decision.level,
        used: formatByteSize(this.policy.metric === "rss" ? sample.residentBytes : sample.heapUsedBytes),
      });
      this.events?.emit("memoryLevelChanged", { previous, level: decision.level });
    }
    this.events?.emit("memoryStatus", status);
    return status;
  }

  /**
   * Evict collapsed subtrees. `regular` takes the least recently touched
   * `regularCleanupBatch` candidates; the other actions take them all.
   */
  cleanup(action: CleanupAction): CleanupReport {
    const tree = this.tree;
    if (action === "none" || !tree) return { action, evictedNodes: 0, droppedNodes: 0 };

    let candidates = findEvictionCandidates(tree);
    if (action === "regular") {
      candidates = candidates
        .sort((a, b) => a.lastTouched - b.lastTouched)
        .slice(0, this.policy.regularCleanupBatch);
    }

    const paths: JsonPath[] = [];
    let droppedNodes = 0;
    for (const node of candidates) {
      const outcome = tree.evict(node);
      if (outcome.evicted) {
        paths.push(node.path);
        droppedNodes += outcome.droppedNodes;
      }
    }

    if (action === "emergency") {
      tree.registry.clear();
      try {
        this.reclaim();
      } catch (error) {
        log.warn("Host memory reclaim failed", {}, error);
      }
    }

    this.cleanupCount++;
    if (paths.length > 0) {
      this.events?.emit("evicted", { paths, droppedNodes, reason: action });
    }
    log.info("Memory cleanup finished", {
      action,
      evictedNodes: paths.length,
      droppedNodes,
      materializedNodes: tree.materializedNodeCount(),
    });
    return { action, evictedNodes: paths.length, droppedNodes };
  }

  getStatus(): MemoryStatus {
    if (this.lastSample) return this.buildStatus(this.lastSample);
    try {
      return this.buildStatus(this.sampler());
    } catch (error) {
      log.warn("Memory sample failed", { code: ErrorCode.MEMORY_SAMPLE_FAILED }, error);
      return this.buildStatus({ heapUsedBytes: 0, residentBytes: 0 });
    }
  }

  private buildStatus(sample: MemorySample): MemoryStatus {
    return {
      level: this.state.level,
      residentBytes: sample.residentBytes,
      heapUsedBytes: sample.heapUsedBytes,
      cacheSize: this.tree?.registry.size ?? 0,
      materializedNodes: this.tree?.materializedNodeCount() ?? 0,
      consecutiveWarnings: this.state.consecutiveWarnings,
      cleanupCount: this.cleanupCount,
    };
  }
}
