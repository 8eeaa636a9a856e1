import { JsonResolveError } from "../errors";

/** A property name or an array index. */
export type PathSegment = string | number;

/** Location of a value from the document root. The root is `[]`. */
export type JsonPath = readonly PathSegment[];

export const ROOT_PATH: JsonPath = Object.freeze([]);

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Canonical string identity of a path. Index segments and property names
 * never collide: `["a", 0]` and `["a", "0"]` map to different keys.
 */
export function pathKey(path: JsonPath): string {
  return JSON.stringify(path);
}

export function pathFromKey(key: string): JsonPath {
  let parsed: unknown;
  try {
    parsed = JSON.parse(key);
  } catch (error) {
    throw JsonResolveError.invalidPathExpression(key, error instanceof Error ? error.message : "not a path key");
  }
  if (!Array.isArray(parsed)) {
    throw JsonResolveError.invalidPathExpression(key, "not a path key");
  }
  const segments: PathSegment[] = [];
  for (const segment of parsed) {
    if (typeof segment === "string") {
      segments.push(segment);
    } else if (typeof segment === "number" && Number.isInteger(segment) && segment >= 0) {
      segments.push(segment);
    } else {
      throw JsonResolveError.invalidPathExpression(key, "segments must be names or indices");
    }
  }
  return segments;
}

export function pathsEqual(a: JsonPath, b: JsonPath): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** Parent path, or `undefined` for the root. */
export function parentPath(path: JsonPath): JsonPath | undefined {
  return path.length === 0 ? undefined : path.slice(0, -1);
}

export function childPath(path: JsonPath, segment: PathSegment): JsonPath {
  return [...path, segment];
}

/** True when `ancestor` is `path` itself or lies on its way to the root. */
export function isAncestorPath(ancestor: JsonPath, path: JsonPath): boolean {
  if (ancestor.length > path.length) return false;
  for (let i = 0; i < ancestor.length; i++) {
    if (ancestor[i] !== path[i]) return false;
  }
  return true;
}

/** JSONPath expression: `$`, `$.items[0]['first name']`. */
export function formatPath(path: JsonPath): string {
  let out = "$";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else if (IDENTIFIER.test(segment)) {
      out += `.${segment}`;
    } else {
      out += `['${segment.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}']`;
    }
  }
  return out;
}

/**
 * Label used for search results and status lines: `items[0].name`.
 * The root is the empty string.
 */
export function displayPath(path: JsonPath): string {
  let out = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else {
      out += out === "" ? segment : `.${segment}`;
    }
  }
  return out;
}

/**
 * Parse a JSONPath expression produced by {@link formatPath}.
 * Accepts dot names, `[n]` indices and quoted bracket names in either quote style.
 */
export function parsePathExpression(expression: string): JsonPath {
  const text = expression.trim();
  if (!text.startsWith("$")) {
    throw JsonResolveError.invalidPathExpression(expression, "must start with $");
  }

  const segments: PathSegment[] = [];
  let i = 1;

  while (i < text.length) {
    const ch = text[i];

    if (ch === ".") {
      let end = i + 1;
      while (end < text.length && text[end] !== "." && text[end] !== "[") end++;
      const name = text.slice(i + 1, end);
      if (name === "") {
        throw JsonResolveError.invalidPathExpression(expression, `empty name at ${i}`);
      }
      segments.push(name);
      i = end;
      continue;
    }

    if (ch === "[") {
      const quote = text[i + 1];
      if (quote === "'" || quote === '"') {
        let name = "";
        let j = i + 2;
        let closed = false;
        while (j < text.length) {
          const c = text[j];
          if (c === "\\" && j + 1 < text.length) {
            name += text[j + 1];
            j += 2;
            continue;
          }
          if (c === quote) {
            closed = true;
            break;
          }
          name += c;
          j++;
        }
        if (!closed || text[j + 1] !== "]") {
          throw JsonResolveError.invalidPathExpression(expression, `unterminated name at ${i}`);
        }
        segments.push(name);
        i = j + 2;
        continue;
      }

      const close = text.indexOf("]", i);
      if (close === -1) {
        throw JsonResolveError.invalidPathExpression(expression, `missing ] after ${i}`);
      }
      const digits = text.slice(i + 1, close);
      if (!/^\d+$/.test(digits)) {
        throw JsonResolveError.invalidPathExpression(expression, `"${digits}" is not an index`);
      }
      segments.push(Number(digits));
      i = close + 1;
      continue;
    }

    throw JsonResolveError.invalidPathExpression(expression, `unexpected "${ch}" at ${i}`);
  }

  return segments;
}
