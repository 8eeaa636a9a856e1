import {
  getNodeValue,
  parseTree,
  printParseErrorCode,
  visit,
  type Node as JsoncNode,
  type ParseError as JsoncParseError,
  type ParseOptions,
} from "jsonc-parser";

import { JsonParseError, JsonScopeError, ErrorCode } from "../errors";
import { mergeParsePolicy, type ParsePolicyInput, type ParsePolicy } from "../config/ParsePolicy";
import { throwIfAborted, yieldToEventLoop } from "../utils/cancellation";
import { createLogger } from "../utils/logger";
import type { JsonPath, PathSegment } from "./JsonPath";

const log = createLogger({ component: "JsonDocument" });

/** Value node in the decoded tree. Opaque outside this module. */
export type ElementRef = JsoncNode;

export type JsonKind = "object" | "array" | "string" | "number" | "boolean" | "null";

export type JsonScalar = string | number | boolean | null;

export interface ParseDocumentOptions {
  signal?: AbortSignal;
  /** Where the bytes came from; carried on the document and in error context */
  filePath?: string;
}

/** Objects wider than this get a name → value table on first lookup. */
const PROPERTY_TABLE_THRESHOLD = 16;
const NORMALIZE_YIELD_EVERY = 100_000;

let nextDocumentId = 1;

/**
 * Immutable decoded JSON document.
 *
 * Property order is source order. Duplicate keys are folded the way
 * `JSON.parse` folds them: the first occurrence keeps its position and the
 * last occurrence supplies the value.
 */
export class JsonDocument {
  readonly id: number;
  readonly loadedAt: Date;
  private readonly propertyTables = new WeakMap<ElementRef, Map<string, ElementRef>>();

  constructor(
    readonly text: string,
    readonly root: ElementRef,
    readonly byteSize: number,
    readonly filePath?: string
  ) {
    this.id = nextDocumentId++;
    this.loadedAt = new Date();
  }

  /**
   * Follow `path` from the root. Missing properties, out-of-range indices and
   * segments that do not fit the container kind give `undefined`.
   */
  resolve(path: JsonPath): ElementRef | undefined {
    let current: ElementRef = this.root;
    for (const segment of path) {
      const next = this.childOf(current, segment);
      if (!next) return undefined;
      current = next;
    }
    return current;
  }

  kindOf(element: ElementRef): JsonKind {
    switch (element.type) {
      case "object":
      case "array":
      case "string":
      case "number":
      case "boolean":
      case "null":
        return element.type;
      default:
        throw new JsonScopeError(
          `Element at offset ${element.offset} is a ${element.type}, not a value`,
          ErrorCode.INTERNAL,
          { operation: "kindOf", offset: element.offset }
        );
    }
  }

  /** Declared cardinality of a container, 0 for scalars. O(1). */
  childCount(element: ElementRef): number {
    if (element.type === "object" || element.type === "array") {
      return element.children?.length ?? 0;
    }
    return 0;
  }

  scalarValue(element: ElementRef): JsonScalar {
    const value: unknown = element.value;
    switch (element.type) {
      case "string":
        return typeof value === "string" ? value : String(value);
      case "number":
        return typeof value === "number" ? value : Number(this.rawText(element));
      case "boolean":
        return value === true;
      case "null":
        return null;
      default:
        throw new JsonScopeError(
          `Element at offset ${element.offset} is a container`,
          ErrorCode.INTERNAL,
          { operation: "scalarValue", offset: element.offset }
        );
    }
  }

  /** Source text of the element, exactly as written. */
  rawText(element: ElementRef): string {
    return this.text.slice(element.offset, element.offset + element.length);
  }

  /** Plain JavaScript value of a subtree. */
  toValue(element: ElementRef = this.root): unknown {
    const value: unknown = getNodeValue(element);
    return value;
  }

  /**
   * Children in source order as `[segment, element]` pairs, starting at
   * `offset` and stopping after `limit` of them.
   */
  *children(element: ElementRef, offset = 0, limit = Number.POSITIVE_INFINITY): Generator<[PathSegment, ElementRef]> {
    const items = element.children;
    if (!items || (element.type !== "object" && element.type !== "array")) return;

    const end = Math.min(items.length, offset + limit);
    for (let i = Math.max(0, offset); i < end; i++) {
      const item = items[i];
      if (element.type === "array") {
        yield [i, item];
        continue;
      }
      const value = propertyValue(item);
      if (value) yield [propertyName(item), value];
    }
  }

  private childOf(element: ElementRef, segment: PathSegment): ElementRef | undefined {
    if (element.type === "array") {
      if (typeof segment !== "number") return undefined;
      return element.children?.[segment];
    }
    if (element.type !== "object" || typeof segment !== "string") return undefined;

    const props = element.children ?? [];
    if (props.length > PROPERTY_TABLE_THRESHOLD) {
      return this.propertyTable(element).get(segment);
    }
    for (const prop of props) {
      if (propertyName(prop) === segment) return propertyValue(prop);
    }
    return undefined;
  }

  private propertyTable(element: ElementRef): Map<string, ElementRef> {
    let table = this.propertyTables.get(element);
    if (!table) {
      table = new Map();
      for (const prop of element.children ?? []) {
        const value = propertyValue(prop);
        if (value) table.set(propertyName(prop), value);
      }
      this.propertyTables.set(element, table);
    }
    return table;
  }
}

function propertyName(prop: JsoncNode): string {
  const key: unknown = prop.children?.[0]?.value;
  return typeof key === "string" ? key : String(key);
}

function propertyValue(prop: JsoncNode): JsoncNode | undefined {
  return prop.children?.[1];
}

function parseOptions(policy: ParsePolicy): ParseOptions {
  return {
    disallowComments: !policy.allowComments,
    allowTrailingComma: policy.allowTrailingCommas,
    allowEmptyContent: false,
  };
}

function lineAndColumn(text: string, offset: number): { line: number; column: number } {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < offset && i < text.length; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: offset - lineStart + 1 };
}

function byteOffset(text: string, charOffset: number): number {
  return Buffer.byteLength(text.slice(0, charOffset), "utf8");
}

function decodeInput(input: string | Uint8Array): string {
  if (typeof input === "string") {
    return input.charCodeAt(0) === 0xfeff ? input.slice(1) : input;
  }
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(input);
  } catch (error) {
    throw JsonParseError.invalidEncoding(error instanceof Error ? error : undefined);
  }
}

/**
 * Syntax and depth check. Throws `JsonParseError` for the first problem
 * found; returns the root element otherwise.
 *
 * The depth walk runs before tree construction so deeply nested input is
 * rejected after at most `maxDepth` levels of descent.
 */
export function decodeTree(text: string, policy: ParsePolicy): ElementRef {
  if (text.trim() === "") {
    throw JsonParseError.empty();
  }

  const options = parseOptions(policy);
  let depth = 0;
  const enter = (offset: number) => {
    depth++;
    if (depth > policy.maxDepth) {
      throw JsonParseError.depthExceeded(policy.maxDepth, byteOffset(text, offset));
    }
  };
  const leave = () => {
    depth--;
  };
  visit(text, { onObjectBegin: enter, onArrayBegin: enter, onObjectEnd: leave, onArrayEnd: leave }, options);

  const errors: JsoncParseError[] = [];
  const root = parseTree(text, errors, options);
  const first = errors[0];
  if (first) {
    const { line, column } = lineAndColumn(text, first.offset);
    throw JsonParseError.malformed(printParseErrorCode(first.error), byteOffset(text, first.offset), line, column);
  }
  if (!root) {
    throw JsonParseError.empty();
  }
  return root;
}

/**
 * Fold duplicate keys in place, iteratively, before the document is shared.
 */
async function normalizeDuplicateKeys(root: ElementRef, signal?: AbortSignal): Promise<number> {
  const stack: ElementRef[] = [root];
  let visited = 0;
  let folded = 0;

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    if (++visited % NORMALIZE_YIELD_EVERY === 0) {
      await yieldToEventLoop();
      throwIfAborted(signal, "parse");
    }

    if (node.type === "array") {
      for (const item of node.children ?? []) stack.push(item);
      continue;
    }
    if (node.type !== "object" || !node.children) continue;

    const seen = new Set<string>();
    let hasDuplicates = false;
    for (const prop of node.children) {
      const name = propertyName(prop);
      if (seen.has(name)) {
        hasDuplicates = true;
        break;
      }
      seen.add(name);
    }

    if (hasDuplicates) {
      const kept: JsoncNode[] = [];
      const slot = new Map<string, number>();
      for (const prop of node.children) {
        const name = propertyName(prop);
        const at = slot.get(name);
        if (at === undefined) {
          slot.set(name, kept.length);
          kept.push(prop);
        } else {
          // Later value, earlier position
          kept[at] = prop;
          folded++;
        }
      }
      node.children = kept;
    }

    for (const prop of node.children) {
      const value = propertyValue(prop);
      if (value) stack.push(value);
    }
  }

  return folded;
}

/**
 * Decode `input` into a {@link JsonDocument}.
 *
 * Size is checked on the byte length before any decoding work. Byte input
 * must be UTF-8; a leading BOM is dropped.
 */
export async function parseDocument(
  input: string | Uint8Array,
  policyInput: ParsePolicyInput = {},
  options: ParseDocumentOptions = {}
): Promise<JsonDocument> {
  const policy = mergeParsePolicy(policyInput);
  const { signal, filePath } = options;
  const byteSize = typeof input === "string" ? Buffer.byteLength(input, "utf8") : input.byteLength;

  if (byteSize > policy.maxBytes) {
    throw JsonParseError.sizeExceeded(byteSize, policy.maxBytes, { filePath });
  }
  throwIfAborted(signal, "parse", { filePath });

  const started = Date.now();
  const text = decodeInput(input);
  const root = decodeTree(text, policy);
  throwIfAborted(signal, "parse", { filePath });

  const folded = await normalizeDuplicateKeys(root, signal);
  const doc = new JsonDocument(text, root, byteSize, filePath);

  log.debug("Document decoded", {
    documentId: doc.id,
    byteSize,
    foldedDuplicateKeys: folded,
    elapsedMs: Date.now() - started,
  });
  return doc;
}
