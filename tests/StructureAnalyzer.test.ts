import { describe, it, expect } from "vitest";
import { parseDocument } from "../src/document/JsonDocument";
import { analyzeStructure, summarizeStructure } from "../src/services/StructureAnalyzer";
import { OperationCancelledError } from "../src/errors";

const SAMPLE = '{"name":"Ada","tags":["x","yz"],"age":36,"ok":true,"none":null,"nested":{"deep":[[]]}}';

describe("analyzeStructure", () => {
  it("should count every kind of value in one pass", async () => {
    const doc = await parseDocument(SAMPLE);
    const info = await analyzeStructure(doc);

    expect(info).toMatchObject({
      totalNodes: 11,
      objectCount: 2,
      arrayCount: 3,
      stringCount: 3,
      numberCount: 1,
      booleanCount: 1,
      nullCount: 1,
      propertyCount: 7,
      arrayItemCount: 3,
      maxDepth: 3,
      maxArrayLength: 2,
      totalStringLength: 6,
      maxStringLength: 3,
      byteSize: SAMPLE.length,
    });
  });

  it("should treat a scalar document as a single node at depth 0", async () => {
    const info = await analyzeStructure(await parseDocument('"solo"'));

    expect(info.totalNodes).toBe(1);
    expect(info.stringCount).toBe(1);
    expect(info.maxDepth).toBe(0);
  });

  it("should return a frozen result", async () => {
    const info = await analyzeStructure(await parseDocument("[]"));
    expect(Object.isFrozen(info)).toBe(true);
  });

  it("should give the same answer whatever the yield interval", async () => {
    const doc = await parseDocument(SAMPLE);
    const coarse = await analyzeStructure(doc);
    const fine = await analyzeStructure(doc, { yieldEvery: 1 });

    expect({ ...fine, analyzedAt: "" }).toEqual({ ...coarse, analyzedAt: "" });
  });

  it("should stop when cancelled before starting", async () => {
    const doc = await parseDocument(SAMPLE);
    const controller = new AbortController();
    controller.abort();

    await expect(analyzeStructure(doc, { signal: controller.signal })).rejects.toBeInstanceOf(OperationCancelledError);
  });

  it("should stop at the next yield when cancelled mid-run", async () => {
    const doc = await parseDocument(JSON.stringify(Array.from({ length: 50 }, (_, i) => i)));
    const controller = new AbortController();

    const running = analyzeStructure(doc, { signal: controller.signal, yieldEvery: 10 });
    controller.abort();

    await expect(running).rejects.toBeInstanceOf(OperationCancelledError);
  });
});

describe("summarizeStructure", () => {
  it("should describe the document on one line", async () => {
    const info = await analyzeStructure(await parseDocument(SAMPLE));
    expect(summarizeStructure(info)).toBe(`11 nodes, 2 objects, 3 arrays, depth 3, ${SAMPLE.length} B`);
  });

  it("should group thousands", async () => {
    const text = JSON.stringify(Array.from({ length: 1500 }, () => 0));
    const info = await analyzeStructure(await parseDocument(text));

    expect(summarizeStructure(info)).toBe("1,501 nodes, 0 objects, 1 arrays, depth 1, 2.93 KB");
  });
});
