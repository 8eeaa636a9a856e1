import { describe, it, expect, afterEach } from "vitest";
import { createLogger, isLogLevel, logger, type LogLevel } from "../src/utils/logger";
import { createEventBus } from "../src/utils/eventBus";
import { JsonLoadError } from "../src/errors";

const initial = { ...logger.getConfig() };

function capture(): Array<[LogLevel, string]> {
  const lines: Array<[LogLevel, string]> = [];
  logger.configure({ minLevel: "debug", structuredOutput: false, sink: (level, line) => lines.push([level, line]) });
  return lines;
}

afterEach(() => {
  logger.configure(initial);
});

describe("logger", () => {
  it("should format component context after the message", () => {
    const lines = capture();
    createLogger({ component: "Test" }).info("Loaded", { count: 3 });

    expect(lines).toEqual([["info", '[jsonscope] [INFO] Loaded | component="Test" count=3']]);
  });

  it("should drop messages below the minimum level", () => {
    const lines = capture();
    logger.configure({ minLevel: "warn" });

    logger.info("quiet");
    logger.warn("loud");

    expect(lines.map(([level]) => level)).toEqual(["warn"]);
  });

  it("should append library error details", () => {
    const lines = capture();
    logger.error("Load failed", {}, JsonLoadError.timeout("$.a", 50));

    expect(lines[0]?.[1]).toBe(
      "[jsonscope] [ERROR] Load failed | [JsonLoadError] | Code: 3001 | Op: load | Loading children of $.a timed out after 50ms | Path: $.a"
    );
  });

  it("should emit one JSON object per line in structured mode", () => {
    const lines = capture();
    logger.configure({ structuredOutput: true });
    logger.warn("Slow", { ms: 12 }, new Error("late"));

    const entry: unknown = JSON.parse(lines[0]?.[1] ?? "null");
    expect(entry).toMatchObject({
      level: "warn",
      message: "Slow",
      context: { ms: 12 },
      error: { name: "Error", message: "late" },
    });
  });

  it("should merge child context", () => {
    const lines = capture();
    createLogger({ component: "A" }).child({ documentId: 7 }).debug("hi");

    expect(lines[0]?.[1]).toBe('[jsonscope] [DEBUG] hi | component="A" documentId=7');
  });

  it("should recognise log level names", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});

describe("createEventBus", () => {
  type Events = { loaded: { count: number }; closed: { reason: string } };

  it("should deliver to listeners in registration order", () => {
    const bus = createEventBus<Events>();
    const seen: string[] = [];
    bus.on("loaded", ({ count }) => seen.push(`first ${count}`));
    bus.on("loaded", ({ count }) => seen.push(`second ${count}`));

    bus.emit("loaded", { count: 2 });

    expect(seen).toEqual(["first 2", "second 2"]);
  });

  it("should stop delivery after unsubscribe", () => {
    const bus = createEventBus<Events>();
    const seen: number[] = [];
    const off = bus.on("loaded", ({ count }) => seen.push(count));

    bus.emit("loaded", { count: 1 });
    off();
    bus.emit("loaded", { count: 2 });

    expect(seen).toEqual([1]);
    expect(bus.listenerCount("loaded")).toBe(0);
  });

  it("should call once listeners a single time", () => {
    const bus = createEventBus<Events>();
    const seen: string[] = [];
    bus.once("closed", ({ reason }) => seen.push(reason));

    bus.emit("closed", { reason: "a" });
    bus.emit("closed", { reason: "b" });

    expect(seen).toEqual(["a"]);
  });

  it("should keep delivering after a listener throws", () => {
    const lines = capture();
    const bus = createEventBus<Events>();
    const seen: number[] = [];
    bus.on("loaded", () => {
      throw new Error("listener broke");
    });
    bus.on("loaded", ({ count }) => seen.push(count));

    bus.emit("loaded", { count: 5 });

    expect(seen).toEqual([5]);
    expect(lines[0]?.[0]).toBe("error");
  });

  it("should remove listeners per event or all at once", () => {
    const bus = createEventBus<Events>();
    bus.on("loaded", () => undefined);
    bus.on("closed", () => undefined);

    bus.removeAllListeners("loaded");
    expect(bus.listenerCount("loaded")).toBe(0);
    expect(bus.listenerCount("closed")).toBe(1);

    bus.removeAllListeners();
    expect(bus.listenerCount("closed")).toBe(0);
  });
});
