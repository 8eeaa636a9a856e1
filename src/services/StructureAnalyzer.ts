/**
 * StructureAnalyzer: one depth-first pass over a decoded document.
 *
 * Keeps counters only. The traversal stack holds one child iterator per
 * open container, so auxiliary space follows the nesting depth, not the
 * document size.
 */

import type { ElementRef, JsonDocument } from "../document/JsonDocument";
import type { PathSegment } from "../document/JsonPath";
import { ANALYZER_DEFAULTS } from "../config/constants";
import { throwIfAborted, yieldToEventLoop } from "../utils/cancellation";
import { formatByteSize } from "../utils/format";
import { createLogger } from "../utils/logger";
import type { AnalyzeOptions, StructureInfo } from "./StructureAnalyzer.types";

export type { AnalyzeOptions, StructureInfo };

const log = createLogger({ component: "StructureAnalyzer" });

interface Frame {
  children: Iterator<[PathSegment, ElementRef]>;
  depth: number;
}

type Counters = Omit<StructureInfo, "byteSize" | "analyzedAt">;

function emptyCounters(): Counters {
  return {
    totalNodes: 0,
    objectCount: 0,
    arrayCount: 0,
    stringCount: 0,
    numberCount: 0,
    booleanCount: 0,
    nullCount: 0,
    propertyCount: 0,
    arrayItemCount: 0,
    maxDepth: 0,
    maxArrayLength: 0,
    totalStringLength: 0,
    maxStringLength: 0,
  };
}

/**
 * Count one value. Returns a frame when the value is a container with children.
 */
function countElement(doc: JsonDocument, element: ElementRef, depth: number, c: Counters): Frame | undefined {
  c.totalNodes++;
  if (depth > c.maxDepth) c.maxDepth = depth;

  const kind = doc.kindOf(element);
  switch (kind) {
    case "object": {
      c.objectCount++;
      const count = doc.childCount(element);
      c.propertyCount += count;
      return count > 0 ? { children: doc.children(element), depth: depth + 1 } : undefined;
    }
    case "array": {
      c.arrayCount++;
      const count = doc.childCount(element);
      c.arrayItemCount += count;
      if (count > c.maxArrayLength) c.maxArrayLength = count;
      return count > 0 ? { children: doc.children(element), depth: depth + 1 } : undefined;
    }
    case "string": {
      c.stringCount++;
      const value = doc.scalarValue(element);
      const length = typeof value === "string" ? value.length : 0;
      c.totalStringLength += length;
      if (length > c.maxStringLength) c.maxStringLength = length;
      return undefined;
    }
    case "number":
      c.numberCount++;
      return undefined;
    case "boolean":
      c.booleanCount++;
      return undefined;
    case "null":
      c.nullCount++;
      return undefined;
  }
}

/**
 * Compute {@link StructureInfo} for `doc`.
 *
 * Cancellation is observed at each yield point and surfaces as
 * `OperationCancelledError`; no partial result is returned.
 */
export async function analyzeStructure(doc: JsonDocument, options: AnalyzeOptions = {}): Promise<StructureInfo> {
  const { signal } = options;
  const yieldEvery = Math.max(1, options.yieldEvery ?? ANALYZER_DEFAULTS.YIELD_EVERY);
  const started = Date.now();
  throwIfAborted(signal, "analyze", { documentId: doc.id });

  const counters = emptyCounters();
  const stack: Frame[] = [];
  const rootFrame = countElement(doc, doc.root, 0, counters);
  if (rootFrame) stack.push(rootFrame);

  let sinceYield = 1;
  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    const next = top.children.next();
    if (next.done) {
      stack.pop();
      continue;
    }

    const frame = countElement(doc, next.value[1], top.depth, counters);
    if (frame) stack.push(frame);

    if (++sinceYield >= yieldEvery) {
      sinceYield = 0;
      await yieldToEventLoop();
      throwIfAborted(signal, "analyze", { documentId: doc.id });
    }
  }

  const info: StructureInfo = Object.freeze({
    ...counters,
    byteSize: doc.byteSize,
    analyzedAt: new Date().toISOString(),
  });

  log.info("Structure analyzed", {
    documentId: doc.id,
    totalNodes: info.totalNodes,
    maxDepth: info.maxDepth,
    elapsedMs: Date.now() - started,
  });
  return info;
}

/** One-line description for a status bar. */
export function summarizeStructure(info: StructureInfo): string {
  const parts = [
    `${info.totalNodes.toLocaleString("en-US")} nodes`,
    `${info.objectCount.toLocaleString("en-US")} objects`,
    `${info.arrayCount.toLocaleString("en-US")} arrays`,
    `depth ${info.maxDepth}`,
    formatByteSize(info.byteSize),
  ];
  return parts.join(", ");
}
