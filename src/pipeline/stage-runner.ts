import type { StageDefinition } from "../types/stage.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import { evaluateGate } from "../quality/assertion-engine.ts";
import {
  toQueryExecutionError,
  type QueryExecutor,
} from "../warehouse/query-executor.ts";
import type { StageOutcome } from "./types.ts";

// ── Stage Runner ────────────────────────────────────────────────────────────

/**
 * Run a single stage against the warehouse. Never throws.
 *
 * Action stages fail with the executor's message verbatim. Quality gates
 * succeed only when every assertion passes and otherwise fail with the
 * first failing assertion's reason.
 */
export async function runStage(
  stage: StageDefinition,
  executor: QueryExecutor,
  logger: Logger = NULL_LOGGER,
): Promise<StageOutcome> {
  const stageStart = Date.now();
  const stageLogger = logger.child({ stage: stage.id });

  switch (stage.kind) {
    case "action": {
      try {
        await executor.execute(stage.action);
      } catch (err: unknown) {
        const error = toQueryExecutionError(err);
        stageLogger.error("Action failed", { error: error.message });
        return {
          status: "failed",
          durationMs: Date.now() - stageStart,
          cause: error.message,
          error,
        };
      }
      return { status: "succeeded", durationMs: Date.now() - stageStart };
    }

    case "quality_gate": {
      const gate = await evaluateGate(stage.assertions, executor, {
        policy: stage.policy,
        logger: stageLogger,
      });
      const durationMs = Date.now() - stageStart;
      if (gate.cause !== undefined) {
        return { status: "failed", durationMs, cause: gate.cause, gate };
      }
      return { status: "succeeded", durationMs, gate };
    }
  }
}
