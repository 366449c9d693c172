import { describe, expect, it } from "vitest";
import { runStage } from "../stage-runner.ts";
import type { StageDefinition } from "../../types/stage.ts";
import { BufferLogger } from "../../observability/logger.ts";
import { InMemoryQueryExecutor } from "../../warehouse/in-memory-executor.ts";
import { QueryExecutionError } from "../../warehouse/query-executor.ts";

const loadSilver: StageDefinition = {
  id: "load_silver",
  kind: "action",
  action: { text: "CALL silver.load_silver();" },
};

const silverGate: StageDefinition = {
  id: "check_silver_quality",
  kind: "quality_gate",
  assertions: [
    { name: "duplicate customers", query: "Q1", comparator: "equals", expected: 0 },
    { name: "duplicate products", query: "Q2", comparator: "equals", expected: 0 },
  ],
};

describe("runStage: action", () => {
  it("succeeds when the command completes", async () => {
    const executor = new InMemoryQueryExecutor();

    const outcome = await runStage(loadSilver, executor);

    expect(outcome.status).toBe("succeeded");
    expect(executor.executedCommands).toEqual(["CALL silver.load_silver();"]);
  });

  it("fails with the executor message verbatim", async () => {
    const executor = new InMemoryQueryExecutor().failCommand(
      "CALL silver.load_silver();",
      'duplicate key value violates unique constraint "crm_cust_info_pkey"',
    );

    const outcome = await runStage(loadSilver, executor);

    expect(outcome.status).toBe("failed");
    if (outcome.status !== "failed") return;
    expect(outcome.cause).toBe(
      'duplicate key value violates unique constraint "crm_cust_info_pkey"',
    );
    expect(outcome.error).toBeInstanceOf(QueryExecutionError);
    expect(outcome.gate).toBeUndefined();
  });

  it("fails instead of throwing when the executor throws a plain error", async () => {
    const outcome = await runStage(loadSilver, {
      execute: async () => {
        throw new Error("Connection terminated unexpectedly");
      },
      queryScalar: async () => null,
    });

    expect(outcome).toMatchObject({
      status: "failed",
      cause: "Connection terminated unexpectedly",
    });
  });
});

describe("runStage: quality gate", () => {
  it("succeeds when every assertion passes", async () => {
    const executor = new InMemoryQueryExecutor().setScalar("Q1", 0).setScalar("Q2", 0);

    const outcome = await runStage(silverGate, executor);

    expect(outcome.status).toBe("succeeded");
    expect(outcome.gate?.passed).toBe(true);
    expect(executor.executedCommands).toEqual([]);
  });

  it("fails with the first failing assertion's reason", async () => {
    const executor = new InMemoryQueryExecutor().setScalar("Q1", 2).setScalar("Q2", 3);

    const outcome = await runStage(silverGate, executor);

    expect(outcome.status).toBe("failed");
    if (outcome.status !== "failed") return;
    expect(outcome.cause).toBe("duplicate customers: expected 0, got 2");
    expect(outcome.gate?.results.map((r) => r.outcome.status)).toEqual([
      "failed",
      "not_run",
    ]);
  });

  it("honours a collect_all gate policy", async () => {
    const executor = new InMemoryQueryExecutor().setScalar("Q1", 2).setScalar("Q2", 3);

    const outcome = await runStage({ ...silverGate, policy: "collect_all" }, executor);

    expect(outcome.gate?.results.map((r) => r.outcome.status)).toEqual([
      "failed",
      "failed",
    ]);
    expect(executor.executedQueries).toEqual(["Q1", "Q2"]);
  });

  it("binds the stage id into log entries", async () => {
    const logger = new BufferLogger();
    const executor = new InMemoryQueryExecutor().setScalar("Q1", 0).setScalar("Q2", 0);

    await runStage(silverGate, executor, logger);

    expect(logger.entries.length).toBeGreaterThan(0);
    for (const entry of logger.entries) {
      expect(entry.data?.["stage"]).toBe("check_silver_quality");
    }
  });
});
