import { describe, it, expect } from "vitest";
import { createLogger, isLogLevel } from "./logger.js";
import { CapturingSink } from "./testing/fakes.js";

describe("createLogger", () => {
  it("writes one JSON line per entry with the base context", () => {
    const sink = new CapturingSink();
    createLogger({ prId: 42 }, "info", sink).info("Scaffolding complete", { threads: 6 });

    expect(sink.out).toHaveLength(1);
    const entry: Record<string, unknown> = JSON.parse(sink.out[0]);
    expect(entry).toEqual({ level: "info", ts: expect.any(String), msg: "Scaffolding complete", prId: 42, threads: 6 });
  });

  it("drops entries below the minimum level", () => {
    const sink = new CapturingSink();
    const logger = createLogger({}, "warn", sink);
    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    expect(sink.messages()).toEqual(["c"]);
  });

  it("sends errors to stderr", () => {
    const sink = new CapturingSink();
    createLogger({}, "info", sink).error("boom");
    expect(sink.out).toEqual([]);
    expect(sink.err).toHaveLength(1);
  });

  it("strips undefined fields and merges child context", () => {
    const sink = new CapturingSink();
    createLogger({ prId: 42 }, "debug", sink).child({ path: "/src/app.ts" }).debug("x", { folder: undefined });

    const entry: Record<string, unknown> = JSON.parse(sink.out[0]);
    expect(Object.keys(entry)).toEqual(["level", "ts", "msg", "prId", "path"]);
  });
});

describe("isLogLevel", () => {
  it("accepts only known levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
