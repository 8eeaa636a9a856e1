import { describe, it, expect } from "vitest";
import { parseDocument } from "../src/document/JsonDocument";
import {
  createRootNode,
  formatDisplayValue,
  materializeChildren,
  materializeInBatches,
} from "../src/services/TreeMaterializer";
import { ErrorCode, JsonResolveError } from "../src/errors";

function numbers(count: number): string {
  return JSON.stringify(Array.from({ length: count }, (_, i) => i));
}

describe("materializeChildren", () => {
  it("should produce object members in source order", async () => {
    const doc = await parseDocument('{"a": 1, "b": [true], "c": {}}');
    const { children, total, partial } = materializeChildren(doc, []);

    expect(children.map((child) => child.key)).toEqual(["a", "b", "c"]);
    expect(children.map((child) => child.path)).toEqual([["a"], ["b"], ["c"]]);
    expect(total).toBe(3);
    expect(partial).toBe(false);
  });

  it("should label array elements by index", async () => {
    const doc = await parseDocument('{"list": ["x", "y", "z"]}');
    const { children } = materializeChildren(doc, ["list"]);

    expect(children.map((child) => child.key)).toEqual(["[0]", "[1]", "[2]"]);
    expect(children.map((child) => child.path)).toEqual([["list", 0], ["list", 1], ["list", 2]]);
    expect(children.map((child) => child.pathKey)).toEqual(['["list",0]', '["list",1]', '["list",2]']);
  });

  it("should stop at the limit and mark the result partial", async () => {
    const doc = await parseDocument(numbers(10_000));
    const root = createRootNode(doc);
    const result = materializeChildren(doc, [], { limit: 100 });

    expect(root.childCount).toBe(10_000);
    expect(result.children).toHaveLength(100);
    expect(result.total).toBe(10_000);
    expect(result.partial).toBe(true);
    expect(result.children[99]?.key).toBe("[99]");
  });

  it("should start a page at the offset", async () => {
    const doc = await parseDocument(numbers(10));
    const result = materializeChildren(doc, [], { offset: 8, limit: 5 });

    expect(result.children.map((child) => child.key)).toEqual(["[8]", "[9]"]);
    expect(result.offset).toBe(8);
    expect(result.partial).toBe(false);
  });

  it("should report child counts without materializing grandchildren", async () => {
    const doc = await parseDocument('{"outer": {"inner": [1, 2, 3]}}');
    const [outer] = materializeChildren(doc, []).children;

    expect(outer?.childCount).toBe(1);
    expect(outer?.children).toBeNull();
    expect(outer?.state).toBe("idle");
  });

  it("should return no children for scalars", async () => {
    const doc = await parseDocument('{"n": 5}');
    expect(materializeChildren(doc, ["n"])).toEqual({ children: [], total: 0, offset: 0, partial: false });
  });

  it("should reject paths that do not resolve", async () => {
    const doc = await parseDocument('{"a": 1}');

    try {
      materializeChildren(doc, ["missing"]);
      expect.fail("expected a resolve error");
    } catch (error) {
      expect(error).toBeInstanceOf(JsonResolveError);
      if (error instanceof JsonResolveError) {
        expect(error.code).toBe(ErrorCode.RESOLVE_PATH_NOT_FOUND);
        expect(error.context.path).toBe("$.missing");
      }
    }
  });
});

describe("materializeInBatches", () => {
  it("should split the page into batches", async () => {
    const doc = await parseDocument(numbers(1200));
    const sizes = [...materializeInBatches(doc, [], { batchSize: 500, limit: 1000 })].map((batch) => batch.length);
    expect(sizes).toEqual([500, 500]);
  });

  it("should hand out the remainder last", async () => {
    const doc = await parseDocument(numbers(1200));
    const batches = [...materializeInBatches(doc, [], { batchSize: 500, offset: 900 })];

    expect(batches.map((batch) => batch.length)).toEqual([300]);
    expect(batches[0]?.[0]?.key).toBe("[900]");
  });
});

describe("formatDisplayValue", () => {
  it("should summarise containers by size", () => {
    expect(formatDisplayValue("object", "", 3)).toBe("{ 3 items }");
    expect(formatDisplayValue("object", "", 0)).toBe("{}");
    expect(formatDisplayValue("array", "", 2)).toBe("[ 2 items ]");
    expect(formatDisplayValue("array", "", 0)).toBe("[]");
  });

  it("should quote and escape strings", () => {
    expect(formatDisplayValue("string", "hi", 0)).toBe('"hi"');
    expect(formatDisplayValue("string", 'say "hi"', 0)).toBe('"say \\"hi\\""');
  });

  it("should cut long strings before quoting", () => {
    const shown = formatDisplayValue("string", "a".repeat(150), 0);
    expect(shown).toBe(`"${"a".repeat(100)}..."`);
  });

  it("should show other scalars as written", () => {
    expect(formatDisplayValue("number", "1.50", 0)).toBe("1.50");
    expect(formatDisplayValue("boolean", "true", 0)).toBe("true");
    expect(formatDisplayValue("null", "null", 0)).toBe("null");
  });
});

describe("createRootNode", () => {
  it("should key the root as $ at the empty path", async () => {
    const root = createRootNode(await parseDocument('{"k": "v"}'));

    expect(root.key).toBe("$");
    expect(root.path).toEqual([]);
    expect(root.displayValue).toBe("{ 1 items }");
    expect(root.hasChildren).toBe(true);
  });

  it("should preview a scalar document", async () => {
    const root = createRootNode(await parseDocument('"text"'));

    expect(root.displayValue).toBe('"text"');
    expect(root.hasChildren).toBe(false);
  });
});
