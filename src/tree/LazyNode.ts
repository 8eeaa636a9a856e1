import type { JsonScopeError } from "../errors";
import type { ElementRef, JsonKind } from "../document/JsonDocument";
import { pathKey, type JsonPath } from "../document/JsonPath";

/**
 * Per-node load state.
 *   idle → loading → loaded | failed
 * Cancellation returns a loading node to where it was; eviction takes a
 * loaded node back to idle.
 */
export type LoadState = "idle" | "loading" | "loaded" | "failed";

export interface LazyNodeInit {
  path: JsonPath;
  key: string;
  kind: JsonKind;
  displayValue: string;
  childCount: number;
  element: ElementRef;
}

/**
 * One value of the document as the tree view sees it.
 *
 * Children are owned by the node once loaded and dropped on eviction.
 * There is no parent reference; the parent is found by path.
 */
export class LazyNode {
  readonly path: JsonPath;
  readonly pathKey: string;
  readonly key: string;
  readonly kind: JsonKind;
  readonly displayValue: string;
  readonly childCount: number;
  /** Decoded element this node stands for */
  readonly element: ElementRef;

  expanded = false;
  state: LoadState = "idle";
  children: LazyNode[] | null = null;
  /** More children exist in the document than are materialized */
  partial = false;
  error: JsonScopeError | null = null;
  lastTouched: number;

  constructor(init: LazyNodeInit, now: number = Date.now()) {
    this.path = init.path;
    this.pathKey = pathKey(init.path);
    this.key = init.key;
    this.kind = init.kind;
    this.displayValue = init.displayValue;
    this.childCount = init.childCount;
    this.element = init.element;
    this.lastTouched = now;
  }

  get depth(): number {
    return this.path.length;
  }

  get loaded(): boolean {
    return this.state === "loaded";
  }

  get loading(): boolean {
    return this.state === "loading";
  }

  get isContainer(): boolean {
    return this.kind === "object" || this.kind === "array";
  }

  /** Whether expanding can produce anything. */
  get hasChildren(): boolean {
    return this.isContainer && this.childCount > 0;
  }

  get materializedCount(): number {
    return this.children?.length ?? 0;
  }

  touch(now: number = Date.now()): void {
    this.lastTouched = now;
  }

  markLoading(): void {
    this.state = "loading";
    this.error = null;
  }

  markLoaded(children: LazyNode[], partial: boolean): void {
    this.children = children;
    this.partial = partial;
    this.state = "loaded";
    this.error = null;
  }

  appendLoaded(children: LazyNode[], partial: boolean): void {
    this.children = [...(this.children ?? []), ...children];
    this.partial = partial;
    this.state = "loaded";
    this.error = null;
  }

  /**
   * A failed first load leaves the node `failed`. A failed page load keeps
   * the children already materialized and records the error.
   */
  markFailed(error: JsonScopeError): void {
    this.error = error;
    this.state = this.children ? "loaded" : "failed";
  }

  /** Undo `markLoading` after a cancelled load. */
  markCancelled(): void {
    this.state = this.children ? "loaded" : "idle";
  }

  /**
   * Drop materialized children. Returns the dropped list, or `null` when the
   * node is expanded, loading or has nothing to drop.
   */
  evict(): LazyNode[] | null {
    if (this.expanded || this.state !== "loaded" || !this.children) return null;
    const dropped = this.children;
    this.children = null;
    this.partial = false;
    this.state = "idle";
    return dropped;
  }
}
