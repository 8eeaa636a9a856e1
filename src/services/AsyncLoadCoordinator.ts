/**
 * AsyncLoadCoordinator: turns "expand node N" into one unit of work.
 *
 * Requests for a path already loading attach to the running load. At most
 * `maxConcurrentLoads` loads hold a slot; the rest wait in FIFO order.
 * Each caller waits with its own timeout and abort signal; what happens to
 * the work when callers give up follows `timeoutBehavior`.
 */

import {
  JsonLoadError,
  JsonResolveError,
  OperationCancelledError,
  isCancellation,
  type JsonScopeError,
} from "../errors";
import type { JsonDocument } from "../document/JsonDocument";
import { formatPath, type JsonPath } from "../document/JsonPath";
import { LOAD_DEFAULTS } from "../config/constants";
import { mergeLoadPolicy, type LoadPolicy, type LoadPolicyInput } from "../config/LoadPolicy";
import { throwIfAborted, yieldToEventLoop } from "../utils/cancellation";
import { createLogger } from "../utils/logger";
import type { JsonScopeEventBus } from "../events";
import type { LazyNode } from "../tree/LazyNode";
import type { LazyTree } from "../tree/LazyTree";
import { materializeInBatches } from "./TreeMaterializer";

const log = createLogger({ component: "AsyncLoadCoordinator" });

export interface BatchRequest {
  document: JsonDocument;
  path: JsonPath;
  offset: number;
  limit: number;
  batchSize: number;
  signal: AbortSignal;
}

/** Produces child batches for one load. */
export type BatchSource = (request: BatchRequest) => Iterable<LazyNode[]> | AsyncIterable<LazyNode[]>;

export interface LoadOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  /** Most children for a first load; defaults to the policy's childLimit */
  limit?: number;
}

export interface LoadMoreOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  /** Children to add; defaults to the policy's childLimit */
  count?: number;
}

export interface LoadStatus {
  activeLoads: number;
  queuedLoads: number;
  inFlight: number;
  maxConcurrentLoads: number;
}

export interface CoordinatorDeps {
  events?: JsonScopeEventBus;
  source?: BatchSource;
}

type LoadOutcome =
  | { ok: true; children: readonly LazyNode[] }
  | { ok: false; error: JsonScopeError };

interface InFlight {
  node: LazyNode;
  controller: AbortController;
  waiters: number;
  outcome: Promise<LoadOutcome>;
}

interface Window {
  offset: number;
  limit: number;
  append: boolean;
}

interface SlotWaiter {
  grant: () => void;
}

const defaultSource: BatchSource = ({ document, path, offset, limit, batchSize }) =>
  materializeInBatches(document, path, { offset, limit, batchSize });

export class AsyncLoadCoordinator {
  readonly policy: LoadPolicy;
  private readonly events?: JsonScopeEventBus;
  private readonly source: BatchSource;
  private readonly inFlight = new Map<string, InFlight>();
  private readonly slotQueue: SlotWaiter[] = [];
  private active = 0;
  private closed = false;

  constructor(
    private readonly tree: LazyTree,
    policy: LoadPolicyInput = {},
    deps: CoordinatorDeps = {}
  ) {
    this.policy = mergeLoadPolicy(policy);
    this.events = deps.events;
    this.source = deps.source ?? defaultSource;
  }

  /**
   * Children of `node`, loading them first when needed. Resolves with the
   * node's child list; every caller coalesced onto one load sees the same
   * array.
   */
  async load(node: LazyNode, options: LoadOptions = {}): Promise<readonly LazyNode[]> {
    this.assertOpen();
    throwIfAborted(options.signal, "load", { path: formatPath(node.path) });
    node.touch();
    if (!node.isContainer) return [];

    const limit = options.limit ?? this.policy.childLimit;
    const running = this.inFlight.get(node.pathKey);
    if (running) return this.wait(running, options);

    if (node.loaded && node.children) {
      if (node.partial && limit > node.materializedCount) {
        return this.loadMore(node, { ...options, count: limit - node.materializedCount });
      }
      return node.children;
    }

    return this.wait(this.start(node, { offset: 0, limit, append: false }), options);
  }

  /** Next page of a partially loaded node. */
  async loadMore(node: LazyNode, options: LoadMoreOptions = {}): Promise<readonly LazyNode[]> {
    this.assertOpen();
    throwIfAborted(options.signal, "loadMore", { path: formatPath(node.path) });
    node.touch();
    if (!node.isContainer) return [];

    const running = this.inFlight.get(node.pathKey);
    if (running) return this.wait(running, options);

    if (!node.loaded || !node.children) {
      return this.load(node, { signal: options.signal, timeoutMs: options.timeoutMs, limit: options.count });
    }
    if (!node.partial) return node.children;

    const count = options.count ?? this.policy.childLimit;
    return this.wait(this.start(node, { offset: node.materializedCount, limit: count, append: true }), options);
  }

  /** Load several nodes; maps each path key to whether its load succeeded. */
  async loadMany(nodes: readonly LazyNode[], options: LoadOptions = {}): Promise<Map<string, boolean>> {
    const settled = await Promise.allSettled(nodes.map((node) => this.load(node, options)));
    const result = new Map<string, boolean>();
    settled.forEach((outcome, i) => {
      result.set(nodes[i].pathKey, outcome.status === "fulfilled");
    });
    return result;
  }

  /**
   * Warm up the first few unloaded container children of a loaded node so
   * the next expansion is immediate. Returns how many were loaded.
   */
  async preloadDirectChildren(node: LazyNode, count: number = LOAD_DEFAULTS.PRELOAD_COUNT): Promise<number> {
    const targets = (node.children ?? []).filter((child) => child.hasChildren && !child.loaded && !child.loading).slice(0, count);
    if (targets.length === 0) return 0;

    const results = await this.loadMany(targets);
    let loaded = 0;
    for (const ok of results.values()) if (ok) loaded++;
    log.debug("Preloaded children", { path: formatPath(node.path), requested: targets.length, loaded });
    return loaded;
  }

  /** Abort every load. Returns how many were running or queued. */
  cancelAll(): number {
    const flights = [...this.inFlight.values()];
    for (const flight of flights) this.abort(flight);
    if (flights.length > 0) log.info("Cancelled all loads", { count: flights.length });
    return flights.length;
  }

  /** Abort everything and refuse further loads. */
  close(): void {
    this.closed = true;
    this.cancelAll();
  }

  isLoading(node: LazyNode): boolean {
    return this.inFlight.has(node.pathKey);
  }

  getStatus(): LoadStatus {
    return {
      activeLoads: this.active,
      queuedLoads: this.slotQueue.length,
      inFlight: this.inFlight.size,
      maxConcurrentLoads: this.policy.maxConcurrentLoads,
    };
  }

  private assertOpen(): void {
    if (this.closed) throw JsonLoadError.documentClosed({ documentId: this.tree.document.id });
  }

  private start(node: LazyNode, window: Window): InFlight {
    const controller = new AbortController();
    node.markLoading();
    this.emitNodeUpdated(node);
    const flight: InFlight = { node, controller, waiters: 0, outcome: this.run(node, controller, window) };
    this.inFlight.set(node.pathKey, flight);
    return flight;
  }

  private isCurrent(node: LazyNode, controller: AbortController): boolean {
    return this.inFlight.get(node.pathKey)?.controller === controller;
  }

  /**
   * Stop a load. The node goes back to where it was before the load began
   * and the path is free for a fresh load straight away.
   */
  private abort(flight: InFlight): void {
    if (flight.controller.signal.aborted) return;
    flight.controller.abort();
    if (this.isCurrent(flight.node, flight.controller)) {
      this.inFlight.delete(flight.node.pathKey);
      flight.node.markCancelled();
      this.emitNodeUpdated(flight.node);
    }
  }

  private async run(node: LazyNode, controller: AbortController, window: Window): Promise<LoadOutcome> {
    const { signal } = controller;
    const path = formatPath(node.path);
    const started = Date.now();

    try {
      await this.acquireSlot(signal, path);
      try {
        const collected: LazyNode[] = [];
        const batches = this.source({
          document: this.tree.document,
          path: node.path,
          offset: window.offset,
          limit: window.limit,
          batchSize: this.policy.batchSize,
          signal,
        });

        let first = true;
        for await (const batch of batches) {
          if (!first) await yieldToEventLoop();
          first = false;
          throwIfAborted(signal, "load", { path });
          for (const child of batch) collected.push(child);
        }
        throwIfAborted(signal, "load", { path });
        if (this.closed) throw JsonLoadError.documentClosed({ path });
        if (!this.tree.contains(node)) {
          log.debug("Load finished for a node no longer in the tree", { path });
          throw new OperationCancelledError("load", { path, reason: "detached" });
        }

        const partial = window.offset + collected.length < node.childCount;
        if (window.append) this.tree.appendChildren(node, collected, partial);
        else this.tree.attachChildren(node, collected, partial);

        const children = node.children ?? collected;
        this.events?.emit("childrenLoaded", {
          path: node.path,
          pathKey: node.pathKey,
          count: children.length,
          total: node.childCount,
          partial,
        });
        this.emitNodeUpdated(node);
        log.debug("Children loaded", {
          path,
          count: collected.length,
          total: node.childCount,
          partial,
          elapsedMs: Date.now() - started,
        });
        return { ok: true, children };
      } finally {
        this.releaseSlot();
      }
    } catch (error) {
      if (isCancellation(error)) {
        if (this.isCurrent(node, controller)) {
          node.markCancelled();
          this.emitNodeUpdated(node);
        }
        log.debug("Load cancelled", { path });
        return { ok: false, error: new OperationCancelledError("load", { path }) };
      }

      const loadError =
        error instanceof JsonResolveError || error instanceof JsonLoadError
          ? error
          : JsonLoadError.failed(path, error instanceof Error ? error : undefined);
      if (this.isCurrent(node, controller)) {
        node.markFailed(loadError);
        this.emitNodeUpdated(node);
      }
      log.warn("Load failed", { path }, loadError);
      return { ok: false, error: loadError };
    } finally {
      if (this.isCurrent(node, controller)) this.inFlight.delete(node.pathKey);
    }
  }

  /**
   * One caller's view of a load: settles with the load, or earlier on the
   * caller's timeout or abort.
   */
  private wait(flight: InFlight, options: { signal?: AbortSignal; timeoutMs?: number }): Promise<readonly LazyNode[]> {
    const timeoutMs = options.timeoutMs ?? this.policy.loadTimeoutMs;
    const { signal } = options;
    const path = formatPath(flight.node.path);
    flight.waiters++;

    return new Promise<readonly LazyNode[]>((resolve, reject) => {
      let settled = false;

      const settle = (): boolean => {
        if (settled) return false;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        flight.controller.signal.removeEventListener("abort", onFlightAbort);
        flight.waiters--;
        return true;
      };

      const onAbort = () => {
        if (!settle()) return;
        if (flight.waiters === 0) this.abort(flight);
        reject(new OperationCancelledError("load", { path }));
      };

      // cancelAll, close, or the last other caller giving up
      const onFlightAbort = () => {
        if (!settle()) return;
        reject(new OperationCancelledError("load", { path }));
      };

      const timer = setTimeout(() => {
        if (!settle()) return;
        const detached = this.policy.timeoutBehavior === "detach" || flight.waiters > 0;
        log.warn("Load timed out", { path, timeoutMs, workContinues: detached });
        if (!detached) this.abort(flight);
        reject(JsonLoadError.timeout(path, timeoutMs));
      }, timeoutMs);

      signal?.addEventListener("abort", onAbort, { once: true });
      flight.controller.signal.addEventListener("abort", onFlightAbort, { once: true });

      void flight.outcome.then(
        (outcome) => {
          if (!settle()) return;
          if (outcome.ok) resolve(outcome.children);
          else reject(outcome.error);
        },
        (error: unknown) => {
          if (!settle()) return;
          reject(error);
        }
      );
    });
  }

  private acquireSlot(signal: AbortSignal, path: string): Promise<void> {
    if (signal.aborted) return Promise.reject(new OperationCancelledError("load", { path }));
    if (this.active < this.policy.maxConcurrentLoads) {
      this.active++;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: SlotWaiter = {
        grant: () => {
          signal.removeEventListener("abort", onAbort);
          resolve();
        },
      };
      const onAbort = () => {
        const index = this.slotQueue.indexOf(waiter);
        if (index >= 0) this.slotQueue.splice(index, 1);
        reject(new OperationCancelledError("load", { path }));
      };
      signal.addEventListener("abort", onAbort, { once: true });
      this.slotQueue.push(waiter);
    });
  }

  private releaseSlot(): void {
    const next = this.slotQueue.shift();
    if (next) {
      // The slot passes straight to the next waiter
      next.grant();
      return;
    }
    this.active--;
  }

  private emitNodeUpdated(node: LazyNode): void {
    this.events?.emit("nodeUpdated", { path: node.path, pathKey: node.pathKey, state: node.state });
  }
}
