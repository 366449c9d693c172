import { describe, it, expect, beforeEach } from "vitest";
import {
  createLogger,
  BufferLogger,
  DEFAULT_LOGGER_CONFIG,
  NULL_LOGGER,
  type Logger,
} from "../logger.ts";

// ── BufferLogger Tests ──────────────────────────────────────────────────────

describe("BufferLogger", () => {
  let logger: BufferLogger;

  beforeEach(() => {
    logger = new BufferLogger();
  });

  it("records entries at all log levels", () => {
    logger.trace("trace message");
    logger.debug("debug message");
    logger.info("info message");
    logger.warn("warn message");
    logger.error("error message");
    logger.fatal("fatal message");

    expect(logger.entries.map((e) => [e.level, e.msg])).toEqual([
      ["trace", "trace message"],
      ["debug", "debug message"],
      ["info", "info message"],
      ["warn", "warn message"],
      ["error", "error message"],
      ["fatal", "fatal message"],
    ]);
  });

  it("stores an ISO timestamp on each entry", () => {
    const before = new Date().toISOString();
    logger.info("test");
    const after = new Date().toISOString();

    const entry = logger.entries[0]!;
    expect(entry.timestamp >= before).toBe(true);
    expect(entry.timestamp <= after).toBe(true);
  });

  it("stores the data payload, or nothing when none is given", () => {
    logger.info("with data", { stage: "load_silver", durationMs: 42 });
    logger.info("no data");

    expect(logger.entries[0]!.data).toEqual({ stage: "load_silver", durationMs: 42 });
    expect(logger.entries[1]!.data).toBeUndefined();
  });

  describe("child()", () => {
    it("merges bindings into every entry", () => {
      const child = logger.child({ module: "pipeline-engine" });
      child.info("Stage started", { stageIndex: 0 });

      expect(logger.entries[0]!.data).toEqual({
        module: "pipeline-engine",
        stageIndex: 0,
      });
    });

    it("shares entries with the parent in both directions", () => {
      const child = logger.child({ module: "test" });
      child.info("from child");
      logger.info("from parent");

      expect(logger.entries).toHaveLength(2);
      expect(child.entries).toHaveLength(2);
    });

    it("child of child merges all ancestor bindings", () => {
      const grandchild = logger
        .child({ module: "pipeline-engine" })
        .child({ stage: "check_gold_quality" });
      grandchild.error("Assertion did not pass", { assertion: "completeness" });

      expect(logger.entries[0]!.data).toEqual({
        module: "pipeline-engine",
        stage: "check_gold_quality",
        assertion: "completeness",
      });
    });

    it("empty bindings leave data untouched", () => {
      logger.child({}).info("test");
      expect(logger.entries[0]!.data).toBeUndefined();
    });

    it("call data overrides a binding with the same key", () => {
      logger.child({ stage: "parent" }).info("test", { stage: "overridden" });
      expect(logger.entries[0]!.data).toEqual({ stage: "overridden" });
    });
  });

  describe("clear()", () => {
    it("removes entries seen by parent and children", () => {
      const child = logger.child({ module: "test" });
      child.info("a");
      logger.info("b");

      logger.clear();

      expect(logger.entries).toHaveLength(0);
      expect(child.entries).toHaveLength(0);
    });
  });

  describe("getByLevel()", () => {
    it("filters entries by level, preserving order", () => {
      logger.info("info 1");
      logger.warn("warn 1");
      logger.info("info 2");
      logger.error("error 1");

      expect(logger.getByLevel("info").map((e) => e.msg)).toEqual(["info 1", "info 2"]);
      expect(logger.getByLevel("fatal")).toEqual([]);
    });
  });

  describe("has()", () => {
    it("matches level and message substring together", () => {
      logger.error("Pipeline aborted");

      expect(logger.has("error", "aborted")).toBe(true);
      expect(logger.has("info", "aborted")).toBe(false);
      expect(logger.has("error", "completed")).toBe(false);
    });
  });
});

// ── NULL_LOGGER ─────────────────────────────────────────────────────────────

describe("NULL_LOGGER", () => {
  it("accepts every call and returns itself as child", () => {
    NULL_LOGGER.info("ignored", { a: 1 });
    NULL_LOGGER.fatal("ignored");
    expect(NULL_LOGGER.child({ module: "x" })).toBe(NULL_LOGGER);
  });
});

// ── createLogger Tests ──────────────────────────────────────────────────────

describe("createLogger", () => {
  it("implements the Logger interface", () => {
    const logger: Logger = createLogger({ level: "silent" });
    for (const method of ["trace", "debug", "info", "warn", "error", "fatal", "child"] as const) {
      expect(typeof logger[method]).toBe("function");
    }
  });

  it("does not throw when logging with or without data", () => {
    const logger = createLogger({ level: "silent", base: { app: "warehouse-pipeline" } });
    logger.info("Run finished", { status: "completed" });
    logger.error("Pipeline aborted");
    logger.child({ module: "test" }).warn("w");
  });
});

describe("DEFAULT_LOGGER_CONFIG", () => {
  it("logs json at info to stderr", () => {
    expect(DEFAULT_LOGGER_CONFIG).toEqual({
      level: "info",
      format: "json",
      destination: 2,
    });
  });
});
