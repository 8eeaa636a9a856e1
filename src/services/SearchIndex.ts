/**
 * SearchIndex: inverted index over the materialized part of a tree.
 *
 * Every entry is one (node, category, content) triple. Content that is
 * short, or is a key or a path, is filed under its lowercased text in
 * `terms`. Value content longer than `ngramMinLength` is filed under each
 * of its lowercased n-grams in `grams` instead, so substring queries can
 * start from the rarest n-gram's postings rather than a full scan.
 *
 * An index is immutable once built. Rebuild and swap to pick up tree changes.
 */

import { displayPath, type JsonPath } from "../document/JsonPath";
import { mergeSearchPolicy, type SearchPolicy } from "../config/SearchPolicy";
import { throwIfAborted, yieldToEventLoop } from "../utils/cancellation";
import { createLogger } from "../utils/logger";
import type { LazyTree } from "../tree/LazyTree";
import type { LazyNode } from "../tree/LazyNode";

const log = createLogger({ component: "SearchIndex" });

export type MatchKind = "key" | "value" | "path";

export interface SearchIndexEntry {
  path: JsonPath;
  pathKey: string;
  displayPath: string;
  key: string;
  matchKind: MatchKind;
  /** Text that queries are matched against */
  content: string;
  depth: number;
}

export interface SearchIndexStats {
  tokenCount: number;
  entryCount: number;
  ngramTokenCount: number;
  estimatedBytes: number;
  builtAt: string;
}

export interface BuildIndexOptions {
  signal?: AbortSignal;
  policy?: Partial<SearchPolicy>;
}

const BUILD_YIELD_EVERY = 10_000;

/** Distinct lowercased n-grams of `text`. */
export function ngramsOf(text: string, size: number): Set<string> {
  const grams = new Set<string>();
  const lower = text.toLowerCase();
  for (let i = 0; i + size <= lower.length; i++) {
    grams.add(lower.slice(i, i + size));
  }
  return grams;
}

/** Content of a leaf as searched: the full string or the source text. */
function leafContent(tree: LazyTree, node: LazyNode): string | null {
  if (node.isContainer) return null;
  const doc = tree.document;
  if (node.kind === "string") {
    const value = doc.scalarValue(node.element);
    return typeof value === "string" ? value : null;
  }
  return doc.rawText(node.element);
}

export class SearchIndex {
  readonly builtAt: Date;

  constructor(
    readonly entries: readonly SearchIndexEntry[],
    /** Lowercased whole content → entry ids */
    readonly terms: ReadonlyMap<string, readonly number[]>,
    /** Lowercased n-gram → entry ids */
    readonly grams: ReadonlyMap<string, readonly number[]>,
    /** Entry ids filed under `grams` rather than `terms` */
    readonly ngrammed: ReadonlySet<number>,
    readonly policy: SearchPolicy,
    builtAt: Date = new Date()
  ) {
    this.builtAt = builtAt;
  }

  static empty(policy: Partial<SearchPolicy> = {}): SearchIndex {
    return new SearchIndex([], new Map(), new Map(), new Set(), mergeSearchPolicy(policy));
  }

  getStats(): SearchIndexStats {
    let postings = 0;
    for (const ids of this.terms.values()) postings += ids.length;
    for (const ids of this.grams.values()) postings += ids.length;
    let text = 0;
    for (const entry of this.entries) text += entry.content.length + entry.displayPath.length;

    return {
      tokenCount: this.terms.size,
      entryCount: this.entries.length,
      ngramTokenCount: this.grams.size,
      // UTF-16 text plus one 8-byte slot per posting
      estimatedBytes: text * 2 + postings * 8,
      builtAt: this.builtAt.toISOString(),
    };
  }
}

class IndexBuilder {
  readonly entries: SearchIndexEntry[] = [];
  readonly terms = new Map<string, number[]>();
  readonly grams = new Map<string, number[]>();
  readonly ngrammed = new Set<number>();

  constructor(private readonly policy: SearchPolicy) {}

  add(node: LazyNode, matchKind: MatchKind, content: string, label: string): void {
    const id = this.entries.length;
    this.entries.push({
      path: node.path,
      pathKey: node.pathKey,
      displayPath: label,
      key: node.key,
      matchKind,
      content,
      depth: node.depth,
    });

    if (matchKind === "value" && content.length > this.policy.ngramMinLength) {
      this.ngrammed.add(id);
      for (const gram of ngramsOf(content, this.policy.ngramSize)) {
        file(this.grams, gram, id);
      }
      return;
    }
    file(this.terms, content.toLowerCase(), id);
  }

  build(): SearchIndex {
    return new SearchIndex(this.entries, this.terms, this.grams, this.ngrammed, this.policy);
  }
}

function file(map: Map<string, number[]>, token: string, id: number): void {
  const ids = map.get(token);
  if (ids) ids.push(id);
  else map.set(token, [id]);
}

/**
 * Index every materialized node of `tree`: the key of each object member,
 * the value of each leaf and the path of each node below the root.
 */
export async function buildSearchIndex(tree: LazyTree, options: BuildIndexOptions = {}): Promise<SearchIndex> {
  const policy = mergeSearchPolicy(options.policy);
  const builder = new IndexBuilder(policy);
  const started = Date.now();
  let visited = 0;

  throwIfAborted(options.signal, "buildIndex");
  for (const node of tree.walkMaterialized()) {
    const label = displayPath(node.path);
    const last = node.path[node.path.length - 1];

    if (typeof last === "string") builder.add(node, "key", last, label);
    const value = leafContent(tree, node);
    if (value !== null) builder.add(node, "value", value, label);
    if (label !== "") builder.add(node, "path", label, label);

    if (++visited % BUILD_YIELD_EVERY === 0) {
      await yieldToEventLoop();
      throwIfAborted(options.signal, "buildIndex");
    }
  }

  const index = builder.build();
  const stats = index.getStats();
  log.info("Search index built", {
    nodes: visited,
    entries: stats.entryCount,
    tokens: stats.tokenCount,
    ngrams: stats.ngramTokenCount,
    elapsedMs: Date.now() - started,
  });
  return index;
}
