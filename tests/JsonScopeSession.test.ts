import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { JsonScopeSession, type SessionOptions } from "../src/services/JsonScopeSession";
import type { JsonScopeEvents } from "../src/events";
import { ErrorCode, JsonLoadError, JsonResolveError } from "../src/errors";

const SAMPLE = '{"user": {"name": "Ada", "langs": ["en", "fr"]}, "count": 2, "items": [1, 2, 3]}';

let dir = "";

beforeAll(async () => {
  dir = await mkdtemp(path.join(tmpdir(), "jsonscope-session-"));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

function open(text: string = SAMPLE, options: SessionOptions = {}): Promise<JsonScopeSession> {
  return JsonScopeSession.open(new TextEncoder().encode(text), { startMonitor: false, ...options });
}

function keysOf(session: JsonScopeSession): string[] {
  return session.visibleRows().map((row) => row.node.key);
}

describe("JsonScopeSession.open", () => {
  it("should start with only the root materialized", async () => {
    const session = await open();

    expect(session.root.key).toBe("$");
    expect(session.root.childCount).toBe(3);
    expect(session.tree.materializedNodeCount()).toBe(1);
    expect(session.monitor.running).toBe(false);
    session.close();
  });

  it("should open a file by path", async () => {
    const file = path.join(dir, "open.json");
    await writeFile(file, SAMPLE, "utf8");

    const session = await JsonScopeSession.open(file, { startMonitor: false });

    expect(session.document.filePath).toBe(file);
    session.close();
  });
});

describe("JsonScopeSession expansion", () => {
  it("should expand and collapse nodes", async () => {
    const session = await open();

    const children = await session.expand(session.root);
    expect(children.map((child) => child.key)).toEqual(["user", "count", "items"]);
    expect(keysOf(session)).toEqual(["$", "user", "count", "items"]);

    await session.expand("$.user");
    expect(keysOf(session)).toEqual(["$", "user", "name", "langs", "count", "items"]);

    session.collapse(["user"]);
    expect(keysOf(session)).toEqual(["$", "user", "count", "items"]);
    expect(session.tree.materializedNodeCount()).toBe(6);
    session.close();
  });

  it("should leave scalars collapsed", async () => {
    const session = await open();
    await session.expand(session.root);

    expect(await session.expand("$.count")).toEqual([]);
    expect(session.getNode("$.count")?.expanded).toBe(false);
    session.close();
  });

  it("should reject paths that are not materialized", async () => {
    const session = await open();
    const error = await session.expand("$.user").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(JsonResolveError);
    if (error instanceof JsonResolveError) expect(error.code).toBe(ErrorCode.RESOLVE_PATH_NOT_FOUND);
    session.close();
  });

  it("should expand a whole subtree within the limits", async () => {
    const session = await open();

    expect(await session.expandAll()).toBe(4);
    expect(session.tree.materializedNodeCount()).toBe(11);
    expect(keysOf(session)).toEqual(["$", "user", "name", "langs", "[0]", "[1]", "count", "items", "[0]", "[1]", "[2]"]);

    session.collapseAll();
    expect(keysOf(session)).toEqual(["$"]);
    session.close();
  });

  it("should stop expanding at the depth and node limits", async () => {
    const shallow = await open();
    expect(await shallow.expandAll(shallow.root, { maxDepth: 0 })).toBe(1);
    shallow.close();

    const capped = await open();
    expect(await capped.expandAll(capped.root, { maxNodes: 2 })).toBe(2);
    capped.close();
  });

  it("should reveal a deep node by expanding its ancestors", async () => {
    const session = await open();
    const node = await session.reveal(["user", "langs", 1]);

    expect(node.key).toBe("[1]");
    expect(node.displayValue).toBe('"fr"');
    expect(session.root.expanded).toBe(true);
    expect(session.getNode("$.user.langs")?.expanded).toBe(true);
    session.close();
  });

  it("should page through a large container to reveal a node", async () => {
    const text = JSON.stringify(Array.from({ length: 30 }, (_, i) => i));
    const session = await open(text, { load: { childLimit: 10 } });

    const node = await session.reveal("$[25]");

    expect(node.key).toBe("[25]");
    expect(session.root.materializedCount).toBe(30);
    session.close();
  });

  it("should window the visible rows", async () => {
    const session = await open();
    await session.expand(session.root);

    expect(session.visibleRows(1, 2).map((row) => row.node.key)).toEqual(["user", "count"]);
    session.close();
  });

  it("should record the focused path", async () => {
    const session = await open();

    session.focus("$.user.name");
    expect(session.tree.focusPath).toEqual(["user", "name"]);

    session.focus(null);
    expect(session.tree.focusPath).toBeNull();
    session.close();
  });

  it("should forward load notifications", async () => {
    const session = await open();
    const loaded: Array<JsonScopeEvents["childrenLoaded"]> = [];
    session.on("childrenLoaded", (detail) => loaded.push(detail));

    await session.expand(session.root);

    expect(loaded.map(({ pathKey, count, total }) => [pathKey, count, total])).toEqual([["[]", 3, 3]]);
    session.close();
  });
});

describe("JsonScopeSession search, analysis and memory", () => {
  it("should search what has been expanded", async () => {
    const session = await open();
    await session.expandAll();

    const results = await session.search("ada");

    expect(results.map((r) => [r.displayPath, r.matchKind])).toEqual([["user.name", "value"]]);
    session.close();
  });

  it("should keep using the last index until it is rebuilt", async () => {
    const session = await open();
    await session.expand(session.root);

    expect(await session.search("name")).toEqual([]);
    await session.expand("$.user");
    expect(await session.search("name")).toEqual([]);

    await session.rebuildSearchIndex();
    const results = await session.search("name");
    expect(results.map((r) => [r.displayPath, r.matchKind])).toEqual([["user.name", "key"]]);
    session.close();
  });

  it("should analyze the document once", async () => {
    const session = await open();

    const first = session.analyze();
    expect(session.analyze()).toBe(first);
    expect((await first).totalNodes).toBe(11);
    session.close();
  });

  it("should give memory back from collapsed subtrees under pressure", async () => {
    const groups = Object.fromEntries(Array.from({ length: 20 }, (_, i) => [`g${i}`, [1, 2, 3, 4, 5]]));
    const session = await open(JSON.stringify(groups));
    const children = await session.expand(session.root);

    for (const child of children) {
      await session.expand(child);
      session.collapse(child);
    }
    expect(session.tree.materializedNodeCount()).toBe(121);

    const report = session.monitor.cleanup("aggressive");

    expect(report).toEqual({ action: "aggressive", evictedNodes: 20, droppedNodes: 100 });
    expect(session.tree.materializedNodeCount()).toBe(21);
    const again = await session.expand("$.g0");
    expect(again.map((node) => node.key)).toEqual(["[0]", "[1]", "[2]", "[3]", "[4]"]);
    session.close();
  });

  it("should report memory from the configured sampler", async () => {
    const session = await open(SAMPLE, { monitor: { sampler: () => ({ heapUsedBytes: 1, residentBytes: 2 }) } });
    await session.expand(session.root);

    expect(session.memoryStatus()).toMatchObject({ level: "normal", heapUsedBytes: 1, materializedNodes: 4 });
    session.close();
  });
});

describe("JsonScopeSession output", () => {
  it("should write the document as JSON", async () => {
    const session = await open();

    expect(session.toJson(0)).toBe('{"user":{"name":"Ada","langs":["en","fr"]},"count":2,"items":[1,2,3]}');
    session.close();
  });

  it("should write a subtree", async () => {
    const session = await open();
    await session.expand(session.root);

    expect(session.toJson(2, "$.items")).toBe("[\n  1,\n  2,\n  3\n]");
    session.close();
  });

  it("should save to a file", async () => {
    const session = await open();
    const file = path.join(dir, "saved.json");

    await session.save(file, 0);

    expect(await readFile(file, "utf8")).toBe(session.toJson(0));
    session.close();
  });
});

describe("JsonScopeSession lifecycle", () => {
  it("should reload the source and start the tree over", async () => {
    const file = path.join(dir, "reload.json");
    await writeFile(file, SAMPLE, "utf8");
    const session = await JsonScopeSession.open(file, { startMonitor: false });
    await session.expandAll();
    await session.search("ada");
    const replaced: Array<JsonScopeEvents["documentReplaced"]> = [];
    session.on("documentReplaced", (detail) => replaced.push(detail));
    const previousId = session.document.id;

    await writeFile(file, '{"fresh": true}', "utf8");
    await session.reload();

    expect(session.root.childCount).toBe(1);
    expect(session.tree.materializedNodeCount()).toBe(1);
    expect(session.searchEngine.index).toBeNull();
    expect(replaced).toEqual([{ previousDocumentId: previousId, documentId: session.document.id }]);
    expect(await session.expand(session.root)).toHaveLength(1);
    session.close();
  });

  it("should refuse loads once closed", async () => {
    const session = await open();
    session.close();
    session.close();

    const error = await session.expand(session.root).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(JsonLoadError);
    if (error instanceof JsonLoadError) expect(error.code).toBe(ErrorCode.LOAD_DOCUMENT_CLOSED);
    expect(session.root.expanded).toBe(false);
  });
});
