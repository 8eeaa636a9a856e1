import { describe, it, expect } from "vitest";
import {
  ROOT_PATH,
  childPath,
  displayPath,
  formatPath,
  isAncestorPath,
  parentPath,
  parsePathExpression,
  pathFromKey,
  pathKey,
  pathsEqual,
} from "../src/document/JsonPath";
import { ErrorCode, JsonResolveError } from "../src/errors";

describe("pathKey", () => {
  it("should keep index and name segments apart", () => {
    expect(pathKey(["a", 0])).toBe('["a",0]');
    expect(pathKey(["a", "0"])).toBe('["a","0"]');
    expect(pathKey(ROOT_PATH)).toBe("[]");
  });

  it("should round trip through pathFromKey", () => {
    expect(pathFromKey('["items",3,"name"]')).toEqual(["items", 3, "name"]);
  });

  it("should reject keys that are not paths", () => {
    expect(() => pathFromKey("{}")).toThrow(JsonResolveError);
    expect(() => pathFromKey("[1.5]")).toThrow(JsonResolveError);
    expect(() => pathFromKey("not json")).toThrow(JsonResolveError);
  });
});

describe("path relations", () => {
  it("should compare paths segment by segment", () => {
    expect(pathsEqual(["a", 1], ["a", 1])).toBe(true);
    expect(pathsEqual(["a", 1], ["a", "1"])).toBe(false);
    expect(pathsEqual(["a"], ["a", 1])).toBe(false);
  });

  it("should give the parent path and undefined for the root", () => {
    expect(parentPath(["a", 1])).toEqual(["a"]);
    expect(parentPath(ROOT_PATH)).toBeUndefined();
  });

  it("should append a segment without touching the original", () => {
    const base = ["a"];
    expect(childPath(base, 2)).toEqual(["a", 2]);
    expect(base).toEqual(["a"]);
  });

  it("should treat a path as its own ancestor", () => {
    expect(isAncestorPath(["a"], ["a", 0, "b"])).toBe(true);
    expect(isAncestorPath(["a", 0], ["a", 0])).toBe(true);
    expect(isAncestorPath(ROOT_PATH, ["x"])).toBe(true);
    expect(isAncestorPath(["a", 1], ["a", 0, "b"])).toBe(false);
    expect(isAncestorPath(["a", 0, "b"], ["a"])).toBe(false);
  });
});

describe("formatPath", () => {
  it("should format the root as $", () => {
    expect(formatPath(ROOT_PATH)).toBe("$");
  });

  it("should use dot names for identifiers and brackets otherwise", () => {
    expect(formatPath(["items", 0, "name"])).toBe("$.items[0].name");
    expect(formatPath(["first name"])).toBe("$['first name']");
    expect(formatPath(["it's"])).toBe("$['it\\'s']");
  });
});

describe("displayPath", () => {
  it("should drop the root marker", () => {
    expect(displayPath(["items", 0, "name"])).toBe("items[0].name");
    expect(displayPath([0, "a"])).toBe("[0].a");
    expect(displayPath(ROOT_PATH)).toBe("");
  });
});

describe("parsePathExpression", () => {
  it("should parse what formatPath produces", () => {
    const paths = [["items", 0, "name"], ["first name", 12], ["it's", "a\\b"], []];
    for (const path of paths) {
      expect(parsePathExpression(formatPath(path))).toEqual(path);
    }
  });

  it("should accept double-quoted bracket names", () => {
    expect(parsePathExpression('$["a.b"][2]')).toEqual(["a.b", 2]);
  });

  it("should reject expressions that do not start at the root", () => {
    try {
      parsePathExpression("items[0]");
      expect.fail("expected a resolve error");
    } catch (error) {
      expect(error).toBeInstanceOf(JsonResolveError);
      if (error instanceof JsonResolveError) {
        expect(error.code).toBe(ErrorCode.RESOLVE_INVALID_EXPRESSION);
      }
    }
  });

  it("should reject malformed segments", () => {
    expect(() => parsePathExpression("$.")).toThrow("empty name");
    expect(() => parsePathExpression("$[x]")).toThrow('"x" is not an index');
    expect(() => parsePathExpression("$['open")).toThrow("unterminated name");
    expect(() => parsePathExpression("$[3")).toThrow("missing ]");
  });
});
