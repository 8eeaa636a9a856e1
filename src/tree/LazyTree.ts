import type { JsonDocument } from "../document/JsonDocument";
import { isAncestorPath, parentPath, pathKey, type JsonPath } from "../document/JsonPath";
import { CACHE_DEFAULTS } from "../config/constants";
import { createRootNode } from "../services/TreeMaterializer";
import type { LazyNode } from "./LazyNode";
import { NodeRegistry } from "./NodeRegistry";

export interface LazyTreeOptions {
  registryMaxEntries?: number;
}

export type EvictRefusal = "expanded" | "loading" | "not-loaded" | "focused";

export type EvictOutcome =
  | { evicted: true; droppedNodes: number }
  | { evicted: false; reason: EvictRefusal };

/**
 * The materialized view of one document.
 *
 * The tree owns every node through the root's children lists. The registry
 * is a lookup shortcut kept in step on attach and evict.
 */
export class LazyTree {
  readonly root: LazyNode;
  readonly registry: NodeRegistry;
  private focus: JsonPath | null = null;
  private materialized = 1;

  constructor(
    readonly document: JsonDocument,
    options: LazyTreeOptions = {}
  ) {
    this.root = createRootNode(document);
    this.registry = new NodeRegistry(options.registryMaxEntries ?? CACHE_DEFAULTS.REGISTRY_MAX_ENTRIES);
    this.registry.set(this.root);
  }

  /**
   * Node at `path` if it is currently materialized.
   */
  getNode(path: JsonPath): LazyNode | undefined {
    const cached = this.registry.get(pathKey(path));
    if (cached) return cached;

    const found = this.walkTo(path);
    if (found) this.registry.set(found);
    return found;
  }

  /** Whether `node` itself is still reachable from the root. */
  contains(node: LazyNode): boolean {
    return this.walkTo(node.path) === node;
  }

  getParent(node: LazyNode): LazyNode | undefined {
    const parent = parentPath(node.path);
    return parent ? this.getNode(parent) : undefined;
  }

  get focusPath(): JsonPath | null {
    return this.focus;
  }

  setFocus(path: JsonPath | null): void {
    this.focus = path;
  }

  /** The focused node and its ancestors are kept through every cleanup. */
  isFocusProtected(node: LazyNode): boolean {
    return this.focus !== null && isAncestorPath(node.path, this.focus);
  }

  attachChildren(node: LazyNode, children: LazyNode[], partial: boolean): void {
    if (node.children) this.forgetSubtree(node);
    node.markLoaded(children, partial);
    for (const child of children) this.registry.set(child);
    this.materialized += children.length;
  }

  appendChildren(node: LazyNode, children: LazyNode[], partial: boolean): void {
    node.appendLoaded(children, partial);
    for (const child of children) this.registry.set(child);
    this.materialized += children.length;
  }

  /**
   * Drop a collapsed node's children and everything below them. A subtree
   * with a load still running anywhere in it is kept whole.
   */
  evict(node: LazyNode): EvictOutcome {
    if (node.expanded) return { evicted: false, reason: "expanded" };
    if (node.loading || this.hasLoadingDescendant(node)) return { evicted: false, reason: "loading" };
    if (!node.loaded || !node.children) return { evicted: false, reason: "not-loaded" };
    if (this.isFocusProtected(node)) return { evicted: false, reason: "focused" };

    const droppedNodes = this.forgetSubtree(node);
    node.evict();
    return { evicted: true, droppedNodes };
  }

  hasLoadingDescendant(node: LazyNode): boolean {
    const stack: LazyNode[] = [...(node.children ?? [])];
    while (stack.length > 0) {
      const current = stack.pop();
      if (!current) break;
      if (current.loading) return true;
      for (const child of current.children ?? []) stack.push(child);
    }
    return false;
  }

  /** Number of nodes currently held, the root included. */
  materializedNodeCount(): number {
    return this.materialized;
  }

  /** Every materialized node, depth first, parents before children. */
  *walkMaterialized(): Generator<LazyNode> {
    const stack: LazyNode[] = [this.root];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;
      yield node;
      const children = node.children;
      if (children) {
        for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
      }
    }
  }

  collapseAll(): void {
    for (const node of this.walkMaterialized()) node.expanded = false;
  }

  private walkTo(path: JsonPath): LazyNode | undefined {
    let current: LazyNode = this.root;
    for (const segment of path) {
      const children = current.children;
      if (!children) return undefined;
      let next: LazyNode | undefined;
      if (typeof segment === "number") {
        // Array pages always start at index 0
        const candidate = children[segment];
        next = candidate && candidate.path[candidate.path.length - 1] === segment ? candidate : undefined;
      } else {
        next = children.find((child) => child.path[child.path.length - 1] === segment);
      }
      if (!next) return undefined;
      current = next;
    }
    return current;
  }

  /** Removes the descendants of `node` from the registry and the count. */
  private forgetSubtree(node: LazyNode): number {
    let dropped = 0;
    const stack: LazyNode[] = [...(node.children ?? [])];
    while (stack.length > 0) {
      const current = stack.pop();
      if (!current) break;
      dropped++;
      this.registry.remove(current.pathKey);
      for (const child of current.children ?? []) stack.push(child);
    }
    this.materialized -= dropped;
    return dropped;
  }
}
