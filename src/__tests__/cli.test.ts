import { describe, expect, it } from "vitest";
import { parseArgs, renderHealth, renderPlan } from "../cli.ts";
import type { PipelineDefinition } from "../types/run.ts";

describe("parseArgs", () => {
  // ── Basic Modes ────────────────────────────────────────────────────────

  it("parses empty args", () => {
    expect(parseArgs([])).toEqual({
      pipeline: null,
      dryRun: false,
      json: false,
      check: false,
      help: false,
    });
  });

  it("parses every flag together", () => {
    expect(
      parseArgs(["--dry-run", "--json", "--check", "--pipeline", "nightly.yaml", "-h"]),
    ).toEqual({
      pipeline: "nightly.yaml",
      dryRun: true,
      json: true,
      check: true,
      help: true,
    });
  });

  // ── Errors ─────────────────────────────────────────────────────────────

  it("requires a value after --pipeline", () => {
    expect(() => parseArgs(["--pipeline"])).toThrow(
      "--pipeline requires a file path argument",
    );
    expect(() => parseArgs(["--pipeline", "--json"])).toThrow(
      "--pipeline requires a file path argument",
    );
  });

  it("rejects unknown arguments", () => {
    expect(() => parseArgs(["--daemon"])).toThrow("Unknown argument: --daemon");
    expect(() => parseArgs(["medallion"])).toThrow("Unknown argument: medallion");
  });
});

describe("renderPlan", () => {
  const definition: PipelineDefinition = {
    id: "medallion",
    name: "Medallion warehouse load",
    description: "",
    stages: [
      {
        id: "load_bronze",
        kind: "action",
        action: { text: "CALL bronze.load_bronze($1, $2);", values: ["/a/", "/b/"] },
      },
      {
        id: "create_gold_views",
        kind: "action",
        action: { text: "-- Gold views\nCREATE OR REPLACE VIEW gold.v AS SELECT 1;" },
      },
      {
        id: "check_gold_quality",
        kind: "quality_gate",
        assertions: [
          { name: "no null keys", query: "Q1", comparator: "equals", expected: 0 },
          {
            name: "completeness",
            query: "Q2",
            comparator: "greater_or_equal",
            expected: 95,
          },
        ],
      },
      {
        id: "check_extra",
        kind: "quality_gate",
        policy: "collect_all",
        assertions: [
          { name: "late rows", query: "Q3", comparator: "less_or_equal", expected: 10 },
        ],
      },
    ],
  };

  it("lists each stage with its command or assertions", () => {
    expect(renderPlan(definition)).toEqual([
      "Pipeline medallion: Medallion warehouse load (4 stages)",
      "[1/4] load_bronze (action) CALL bronze.load_bronze($1, $2); [2 bound values]",
      "[2/4] create_gold_views (action) -- Gold views …",
      "[3/4] check_gold_quality (quality_gate, fail_fast) 2 assertions",
      "    - no null keys (expected 0)",
      "    - completeness (expected >= 95)",
      "[4/4] check_extra (quality_gate, collect_all) 1 assertion",
      "    - late rows (expected <= 10)",
    ]);
  });

  it("truncates long single-line commands", () => {
    const long = `SELECT ${"x, ".repeat(40)}y`;
    const [, line] = renderPlan({
      ...definition,
      stages: [{ id: "wide", kind: "action", action: { text: long } }],
    });

    expect(line).toBe(`[1/1] wide (action) ${long.slice(0, 72)}…`);
  });
});

describe("renderHealth", () => {
  it("shows the status of a healthy warehouse", () => {
    expect(
      renderHealth({
        name: "warehouse",
        status: "healthy",
        lastCheckedAt: "2026-01-01T00:00:00.000Z",
        details: { closed: false },
      }),
    ).toBe("warehouse: healthy");
  });

  it("appends the connection error when offline", () => {
    expect(
      renderHealth({
        name: "warehouse",
        status: "offline",
        lastCheckedAt: "2026-01-01T00:00:00.000Z",
        details: { error: "Connection terminated", closed: false },
      }),
    ).toBe("warehouse: offline (Connection terminated)");
  });
});
