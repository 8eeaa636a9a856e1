/**
 * JsonScopeSession: the surface a viewer shell talks to.
 *
 * Owns one document and its tree, the load coordinator, the memory
 * monitor and the search engine, and forwards their change notifications
 * through a single event bus.
 */

import { JsonResolveError, isCancellation } from "../errors";
import { openDocument, writeDocumentText } from "../document/DocumentLoader";
import type { JsonDocument } from "../document/JsonDocument";
import { formatPath, parsePathExpression, type JsonPath } from "../document/JsonPath";
import type { ParsePolicyInput } from "../config/ParsePolicy";
import type { LoadPolicyInput } from "../config/LoadPolicy";
import type { MemoryPolicyInput } from "../config/MemoryPolicy";
import type { SearchPolicy } from "../config/SearchPolicy";
import { createJsonScopeEventBus, type JsonScopeEventBus, type JsonScopeEvents } from "../events";
import type { EventListener } from "../utils/eventBus";
import { createLogger } from "../utils/logger";
import { formatByteSize } from "../utils/format";
import { LazyNode } from "../tree/LazyNode";
import { LazyTree } from "../tree/LazyTree";
import { visibleRows, type VisibleRow } from "../tree/visibleRows";
import { toJsonText } from "../tree/TreeSerializer";
import {
  AsyncLoadCoordinator,
  type BatchSource,
  type LoadMoreOptions,
  type LoadOptions,
} from "./AsyncLoadCoordinator";
import { MemoryPressureMonitor, type MemoryStatus, type MonitorDeps } from "./MemoryPressureMonitor";
import { SearchEngine, type SearchOptions, type SearchResult } from "./SearchEngine";
import type { SearchIndexStats } from "./SearchIndex";
import { analyzeStructure } from "./StructureAnalyzer";
import type { StructureInfo } from "./StructureAnalyzer.types";

const log = createLogger({ component: "JsonScopeSession" });

export interface SessionOptions {
  parse?: ParsePolicyInput;
  load?: LoadPolicyInput;
  memory?: MemoryPolicyInput;
  search?: Partial<SearchPolicy>;
  /** Start periodic memory sampling; defaults to the memory policy's `enabled` */
  startMonitor?: boolean;
  signal?: AbortSignal;
  /** Replaces the memory sampler and reclaim hook */
  monitor?: Omit<MonitorDeps, "events">;
  /** Replaces how child batches are produced */
  batchSource?: BatchSource;
}

export interface ExpandAllOptions {
  /** Stop once this many nodes have been expanded */
  maxNodes?: number;
  /** Deepest level, relative to the starting node, to expand */
  maxDepth?: number;
  signal?: AbortSignal;
}

/** A node, its path, or a JSONPath expression such as `$.items[0]`. */
export type NodeRef = LazyNode | JsonPath | string;

function toPath(ref: NodeRef): JsonPath {
  if (ref instanceof LazyNode) return ref.path;
  return typeof ref === "string" ? parsePathExpression(ref) : ref;
}

const EXPAND_ALL_DEFAULTS = { maxNodes: 10_000, maxDepth: 10 } as const;

export class JsonScopeSession {
  readonly events: JsonScopeEventBus = createJsonScopeEventBus();
  readonly monitor: MemoryPressureMonitor;
  readonly searchEngine: SearchEngine;
  private doc: JsonDocument;
  private lazyTree: LazyTree;
  private coordinator: AsyncLoadCoordinator;
  private analysis: Promise<StructureInfo> | null = null;
  private closed = false;

  private constructor(
    private readonly source: string | Uint8Array,
    document: JsonDocument,
    private readonly options: SessionOptions
  ) {
    this.doc = document;
    this.lazyTree = new LazyTree(document);
    this.coordinator = this.createCoordinator(this.lazyTree);
    this.monitor = new MemoryPressureMonitor(this.lazyTree, options.memory, { ...options.monitor, events: this.events });
    this.searchEngine = new SearchEngine(options.search);
  }

  /**
   * Open a file path or in-memory bytes. Parse and open failures reject and
   * leave nothing behind.
   */
  static async open(source: string | Uint8Array, options: SessionOptions = {}): Promise<JsonScopeSession> {
    const document = await openDocument(source, options.parse, options.signal);
    const session = new JsonScopeSession(source, document, options);
    if (options.startMonitor ?? session.monitor.policy.enabled) session.monitor.start();

    log.info("Session opened", {
      documentId: document.id,
      filePath: document.filePath,
      size: formatByteSize(document.byteSize),
    });
    return session;
  }

  get document(): JsonDocument {
    return this.doc;
  }

  get tree(): LazyTree {
    return this.lazyTree;
  }

  get loader(): AsyncLoadCoordinator {
    return this.coordinator;
  }

  get root(): LazyNode {
    return this.lazyTree.root;
  }

  /** Structure statistics, computed once per document. */
  analyze(signal?: AbortSignal): Promise<StructureInfo> {
    if (!this.analysis) {
      const running = analyzeStructure(this.doc, { signal });
      this.analysis = running;
      void running.catch((error: unknown) => {
        // A cancelled or failed run must not be served to later callers
        if (this.analysis === running) this.analysis = null;
        if (!isCancellation(error)) log.warn("Analysis failed", { documentId: this.doc.id }, error);
      });
    }
    return this.analysis;
  }

  getNode(ref: NodeRef): LazyNode | undefined {
    if (ref instanceof LazyNode) return ref;
    return this.lazyTree.getNode(toPath(ref));
  }

  /**
   * Mark a node expanded and load its children. A failed or timed-out
   * load leaves the node collapsed.
   */
  async expand(ref: NodeRef, options: LoadOptions = {}): Promise<readonly LazyNode[]> {
    const node = this.requireNode(ref);
    if (!node.hasChildren) return [];
    node.expanded = true;
    try {
      return await this.coordinator.load(node, options);
    } catch (error) {
      node.expanded = false;
      throw error;
    }
  }

  loadMore(ref: NodeRef, options: LoadMoreOptions = {}): Promise<readonly LazyNode[]> {
    return this.coordinator.loadMore(this.requireNode(ref), options);
  }

  /** Hide a node's children. Memory is reclaimed later by the monitor. */
  collapse(ref: NodeRef): void {
    const node = this.requireNode(ref);
    node.expanded = false;
    node.touch();
  }

  /**
   * Expand `ref` and its descendants breadth first, within the limits.
   * Returns how many nodes were expanded.
   */
  async expandAll(ref: NodeRef = this.root, options: ExpandAllOptions = {}): Promise<number> {
    const maxNodes = options.maxNodes ?? EXPAND_ALL_DEFAULTS.maxNodes;
    const maxDepth = options.maxDepth ?? EXPAND_ALL_DEFAULTS.maxDepth;
    const start = this.requireNode(ref);
    const queue: LazyNode[] = [start];
    let expanded = 0;

    while (queue.length > 0 && expanded < maxNodes) {
      const node = queue.shift();
      if (!node) break;
      if (!node.hasChildren || node.depth - start.depth > maxDepth) continue;

      const children = await this.expand(node, { signal: options.signal });
      expanded++;
      for (const child of children) {
        if (child.hasChildren) queue.push(child);
      }
    }
    return expanded;
  }

  collapseAll(): void {
    this.lazyTree.collapseAll();
  }

  /**
   * Expand every ancestor of `path` so its node is materialized, then
   * return it. Paged ancestors load further pages until the next step
   * along the path appears.
   */
  async reveal(ref: NodeRef, options: LoadOptions = {}): Promise<LazyNode> {
    const path = toPath(ref);
    for (let depth = 0; depth < path.length; depth++) {
      const ancestor = this.requireNode(path.slice(0, depth));
      await this.expand(ancestor, options);
      const step = path.slice(0, depth + 1);
      while (!this.lazyTree.getNode(step) && ancestor.partial) {
        await this.coordinator.loadMore(ancestor, { signal: options.signal, timeoutMs: options.timeoutMs });
      }
    }
    return this.requireNode(path);
  }

  /** Protect `ref` and its ancestors from eviction; `null` clears it. */
  focus(ref: NodeRef | null): void {
    if (ref === null) {
      this.lazyTree.setFocus(null);
      return;
    }
    this.lazyTree.setFocus(toPath(ref));
  }

  visibleRows(offset = 0, limit?: number): VisibleRow[] {
    return visibleRows(this.lazyTree, { offset, limit });
  }

  rebuildSearchIndex(signal?: AbortSignal): Promise<SearchIndexStats> {
    return this.searchEngine.rebuild(this.lazyTree, signal);
  }

  /**
   * Search the materialized tree. The first search builds the index; after
   * that the last built index is used until `rebuildSearchIndex`.
   */
  async search(query: string, options: SearchOptions = {}, signal?: AbortSignal): Promise<SearchResult[]> {
    if (!this.searchEngine.index) await this.rebuildSearchIndex(signal);
    return this.searchEngine.search(query, options, signal);
  }

  memoryStatus(): MemoryStatus {
    return this.monitor.getStatus();
  }

  on<K extends keyof JsonScopeEvents & string>(type: K, listener: EventListener<JsonScopeEvents[K]>): () => void {
    return this.events.on(type, listener);
  }

  /**
   * Read the source again and replace the whole document. Loads in
   * progress are cancelled; the tree, analysis and search index start over.
   */
  async reload(signal?: AbortSignal): Promise<void> {
    const next = await openDocument(this.source, this.options.parse, signal);
    const previousDocumentId = this.doc.id;

    this.coordinator.close();
    this.doc = next;
    this.lazyTree = new LazyTree(next);
    this.coordinator = this.createCoordinator(this.lazyTree);
    this.monitor.setTree(this.lazyTree);
    this.searchEngine.clear();
    this.analysis = null;

    this.events.emit("documentReplaced", { previousDocumentId, documentId: next.id });
    log.info("Document reloaded", { previousDocumentId, documentId: next.id });
  }

  toJson(indent: number | string = 2, ref: NodeRef = this.root): string {
    return toJsonText(this.doc, this.requireNode(ref), indent);
  }

  async save(filePath: string, indent: number | string = 2): Promise<void> {
    await writeDocumentText(filePath, this.toJson(indent));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.monitor.stop();
    this.coordinator.close();
    this.monitor.setTree(null);
    this.searchEngine.clear();
    this.events.removeAllListeners();
    log.info("Session closed", { documentId: this.doc.id });
  }

  private createCoordinator(tree: LazyTree): AsyncLoadCoordinator {
    return new AsyncLoadCoordinator(tree, this.options.load, {
      events: this.events,
      source: this.options.batchSource,
    });
  }

  private requireNode(ref: NodeRef): LazyNode {
    const node = this.getNode(ref);
    if (!node) {
      const label = typeof ref === "string" ? ref : formatPath(toPath(ref));
      throw JsonResolveError.pathNotFound(label, { operation: "getNode" });
    }
    return node;
  }
}
