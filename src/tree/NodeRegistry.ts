import { CACHE_DEFAULTS } from "../config/constants";
import type { LazyNode } from "./LazyNode";

export interface RegistryStats {
  size: number;
  maxEntries: number;
  hits: number;
  misses: number;
  evictions: number;
}

/**
 * Bounded path-key → node index.
 *
 * Best effort only: the tree owns the nodes, and a miss means "walk from the
 * root". Entries are kept in recency order and the oldest is dropped once
 * the bound is reached.
 */
export class NodeRegistry {
  private readonly entries = new Map<string, LazyNode>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(private readonly maxEntries: number = CACHE_DEFAULTS.REGISTRY_MAX_ENTRIES) {}

  get(key: string): LazyNode | undefined {
    const node = this.entries.get(key);
    if (!node) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    // Refresh recency
    this.entries.delete(key);
    this.entries.set(key, node);
    return node;
  }

  set(node: LazyNode): void {
    this.entries.delete(node.pathKey);
    this.entries.set(node.pathKey, node);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  remove(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  getStats(): RegistryStats {
    return {
      size: this.entries.size,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }
}
