/**
 * TreeMaterializer: immediate children of a path as new LazyNodes.
 *
 * Never descends past one level: each child reports its own child count
 * from the decoded element without touching grandchildren.
 */

import { JsonResolveError } from "../errors";
import type { ElementRef, JsonDocument, JsonKind } from "../document/JsonDocument";
import { childPath, formatPath, ROOT_PATH, type JsonPath } from "../document/JsonPath";
import { MATERIALIZE_DEFAULTS } from "../config/constants";
import { truncateText } from "../utils/format";
import { LazyNode } from "../tree/LazyNode";

export interface MaterializeOptions {
  /** Most children to produce */
  limit?: number;
  /** Index of the first child to produce */
  offset?: number;
}

export interface BatchOptions extends MaterializeOptions {
  batchSize?: number;
}

export interface MaterializeResult {
  children: LazyNode[];
  /** Declared cardinality of the parent */
  total: number;
  offset: number;
  /** `offset + children.length < total` */
  partial: boolean;
}

export const ROOT_KEY = "$";

/**
 * Preview text for a row. Pure and bounded.
 *
 * @param raw decoded string for strings, source text for every other scalar
 */
export function formatDisplayValue(
  kind: JsonKind,
  raw: string,
  childCount: number,
  maxChars: number = MATERIALIZE_DEFAULTS.DISPLAY_MAX_CHARS
): string {
  switch (kind) {
    case "object":
      return childCount === 0 ? "{}" : `{ ${childCount} items }`;
    case "array":
      return childCount === 0 ? "[]" : `[ ${childCount} items ]`;
    case "string":
      return JSON.stringify(truncateText(raw, maxChars));
    case "number":
      return truncateText(raw, maxChars);
    case "boolean":
    case "null":
      return raw;
  }
}

export function createLazyNode(doc: JsonDocument, element: ElementRef, path: JsonPath, key: string): LazyNode {
  const kind = doc.kindOf(element);
  const childCount = doc.childCount(element);
  let raw = "";
  if (kind === "string") {
    const value = doc.scalarValue(element);
    raw = typeof value === "string" ? value : "";
  } else if (kind !== "object" && kind !== "array") {
    raw = doc.rawText(element);
  }

  return new LazyNode({
    path,
    key,
    kind,
    displayValue: formatDisplayValue(kind, raw, childCount),
    childCount,
    element,
  });
}

export function createRootNode(doc: JsonDocument): LazyNode {
  return createLazyNode(doc, doc.root, ROOT_PATH, ROOT_KEY);
}

function resolveContainer(doc: JsonDocument, path: JsonPath): ElementRef {
  const element = doc.resolve(path);
  if (!element) {
    throw JsonResolveError.pathNotFound(formatPath(path), { documentId: doc.id });
  }
  return element;
}

function toNode(doc: JsonDocument, parent: JsonPath, segment: string | number, element: ElementRef): LazyNode {
  const key = typeof segment === "number" ? `[${segment}]` : segment;
  return createLazyNode(doc, element, childPath(parent, segment), key);
}

/**
 * Children of `path` in source order, at most `limit` of them from `offset`.
 * Scalars have no children; their result is empty and not partial.
 */
export function materializeChildren(doc: JsonDocument, path: JsonPath, options: MaterializeOptions = {}): MaterializeResult {
  const limit = Math.max(0, options.limit ?? MATERIALIZE_DEFAULTS.CHILD_LIMIT);
  const offset = Math.max(0, options.offset ?? 0);
  const element = resolveContainer(doc, path);
  const total = doc.childCount(element);

  const children: LazyNode[] = [];
  for (const [segment, child] of doc.children(element, offset, limit)) {
    children.push(toNode(doc, path, segment, child));
  }

  return { children, total, offset, partial: offset + children.length < total };
}

/**
 * Same children as {@link materializeChildren}, handed out `batchSize` at a
 * time so a caller can yield between batches.
 */
export function* materializeInBatches(
  doc: JsonDocument,
  path: JsonPath,
  options: BatchOptions = {}
): Generator<LazyNode[]> {
  const limit = Math.max(0, options.limit ?? MATERIALIZE_DEFAULTS.CHILD_LIMIT);
  const offset = Math.max(0, options.offset ?? 0);
  const batchSize = Math.max(1, options.batchSize ?? MATERIALIZE_DEFAULTS.BATCH_SIZE);
  const element = resolveContainer(doc, path);

  let batch: LazyNode[] = [];
  for (const [segment, child] of doc.children(element, offset, limit)) {
    batch.push(toNode(doc, path, segment, child));
    if (batch.length >= batchSize) {
      yield batch;
      batch = [];
    }
  }
  if (batch.length > 0) yield batch;
}
