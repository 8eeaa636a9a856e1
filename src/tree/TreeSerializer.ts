import type { ElementRef, JsonDocument } from "../document/JsonDocument";
import type { LazyNode } from "./LazyNode";

/**
 * Write a property without going through the prototype setter, so a key
 * named "__proto__" stays an ordinary property.
 */
function defineProperty(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/** Loaded, complete children, or `null` when the document must be read instead. */
function usableChildren(node: LazyNode): LazyNode[] | null {
  return node.loaded && !node.partial && node.children ? node.children : null;
}

function elementValue(doc: JsonDocument, element: ElementRef): unknown {
  const kind = doc.kindOf(element);
  if (kind === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, child] of doc.children(element)) defineProperty(out, String(key), elementValue(doc, child));
    return out;
  }
  if (kind === "array") {
    const out: unknown[] = [];
    for (const [, child] of doc.children(element)) out.push(elementValue(doc, child));
    return out;
  }
  return doc.scalarValue(element);
}

/**
 * Plain value for `node`: objects map keys to serialized children, arrays
 * list them, leaves give their value. Containers that are not fully loaded
 * are read from the document.
 */
export function serializeTree(doc: JsonDocument, node: LazyNode): unknown {
  const children = usableChildren(node);
  if (!children || !node.isContainer) return elementValue(doc, node.element);

  if (node.kind === "object") {
    const out: Record<string, unknown> = {};
    for (const child of children) defineProperty(out, child.key, serializeTree(doc, child));
    return out;
  }
  return children.map((child) => serializeTree(doc, child));
}

class TextWriter {
  private readonly parts: string[] = [];

  constructor(
    private readonly doc: JsonDocument,
    private readonly indent: string
  ) {}

  private newline(level: number): string {
    return this.indent === "" ? "" : "\n" + this.indent.repeat(level);
  }

  private open(kind: "object" | "array", entries: Array<[string | null, () => void]>, level: number): void {
    const [start, end] = kind === "object" ? ["{", "}"] : ["[", "]"];
    if (entries.length === 0) {
      this.parts.push(start + end);
      return;
    }
    const separator = this.indent === "" ? ":" : ": ";
    this.parts.push(start);
    entries.forEach(([key, writeValue], i) => {
      if (i > 0) this.parts.push(",");
      this.parts.push(this.newline(level + 1));
      if (key !== null) this.parts.push(JSON.stringify(key) + separator);
      writeValue();
    });
    this.parts.push(this.newline(level) + end);
  }

  writeElement(element: ElementRef, level: number): void {
    const kind = this.doc.kindOf(element);
    if (kind === "object" || kind === "array") {
      const entries: Array<[string | null, () => void]> = [];
      for (const [key, child] of this.doc.children(element)) {
        entries.push([kind === "object" ? String(key) : null, () => this.writeElement(child, level + 1)]);
      }
      this.open(kind, entries, level);
      return;
    }
    if (kind === "string") {
      this.parts.push(JSON.stringify(this.doc.scalarValue(element)));
      return;
    }
    // Numbers keep their source spelling
    this.parts.push(this.doc.rawText(element));
  }

  writeNode(node: LazyNode, level: number): void {
    const children = usableChildren(node);
    if (!children || (node.kind !== "object" && node.kind !== "array")) {
      this.writeElement(node.element, level);
      return;
    }
    const isObject = node.kind === "object";
    this.open(
      node.kind,
      children.map((child): [string | null, () => void] => [isObject ? child.key : null, () => this.writeNode(child, level + 1)]),
      level
    );
  }

  toString(): string {
    return this.parts.join("");
  }
}

/**
 * JSON text for `node`, in source key order with numbers spelled as in the
 * source. `indent` of 0 gives compact output.
 */
export function toJsonText(doc: JsonDocument, node: LazyNode, indent: number | string = 2): string {
  const unit = typeof indent === "number" ? " ".repeat(Math.max(0, Math.min(indent, 10))) : indent;
  const writer = new TextWriter(doc, unit);
  writer.writeNode(node, 0);
  return writer.toString();
}
