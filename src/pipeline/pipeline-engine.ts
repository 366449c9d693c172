import type { PipelineDefinition, Run, RunStatus } from "../types/run.ts";
import type { StageDefinition } from "../types/stage.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import type { QueryExecutor } from "../warehouse/query-executor.ts";
import { generateRunId } from "./id.ts";
import { runStage } from "./stage-runner.ts";
import type {
  PipelineEngineConfig,
  PipelineResult,
  StageResult,
} from "./types.ts";
import { PipelineError } from "./types.ts";

// ── Sequential Pipeline Engine ──────────────────────────────────────────────

export class SequentialPipelineEngine {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = (logger ?? NULL_LOGGER).child({ module: "pipeline-engine" });
  }

  /**
   * Execute a pipeline definition stage by stage.
   * Never throws; always returns a PipelineResult.
   *
   * The first failing stage aborts the run: it ends `failed`, every later
   * stage ends `skipped`, and its cause becomes the run's abort cause.
   */
  async execute(
    definition: PipelineDefinition,
    executor: QueryExecutor,
    config: PipelineEngineConfig = {},
  ): Promise<PipelineResult> {
    const startTime = Date.now();
    const run = createRun(definition, config.runId);
    const stageResults: StageResult[] = [];
    const logger = this.logger.child({
      runId: run.id,
      pipelineId: definition.id,
    });

    // ── Validation ──────────────────────────────────────────────────────

    const invalid = validateStages(definition.stages, run.id);
    if (invalid) {
      logger.error("Pipeline rejected before start", {
        code: invalid.code,
        error: invalid.message,
      });
      return this.abortBeforeStart(definition, run, config, invalid, startTime);
    }

    // ── Stage Loop ──────────────────────────────────────────────────────

    this.updateRunStatus(run, "running", config);
    logger.info("Pipeline started", { stages: definition.stages.length });

    for (const [stageIndex, stage] of definition.stages.entries()) {
      run.currentStageIndex = stageIndex;
      run.stageStatuses[stageIndex] = "running";
      this.safeCallback(logger, "onStageStart", () =>
        config.onStageStart?.(stage, stageIndex),
      );
      logger.info("Stage started", {
        stage: stage.id,
        kind: stage.kind,
        position: `${stageIndex + 1}/${definition.stages.length}`,
      });

      let stageResult: StageResult;
      try {
        stageResult = await this.executeStage(stage, stageIndex, executor, run, logger);
      } catch (err: unknown) {
        // runStage never throws; this guards the run against anything else.
        const message = err instanceof Error ? err.message : String(err);
        stageResult = {
          stageIndex,
          stage,
          status: "failed",
          durationMs: 0,
          cause: `Unexpected error: ${message}`,
          error: new PipelineError(
            `Unexpected error: ${message}`,
            "UNKNOWN",
            run.id,
            stageIndex,
            err instanceof Error ? err : undefined,
          ),
        };
      }

      run.stageStatuses[stageIndex] = stageResult.status;
      stageResults.push(stageResult);
      this.safeCallback(logger, "onStageComplete", () =>
        config.onStageComplete?.(stageResult),
      );

      if (stageResult.status === "failed") {
        const cause = stageResult.cause ?? "unknown reason";
        run.abortedAt = { stageIndex, stageId: stage.id, cause };
        stageResults.push(
          ...this.skipRemaining(definition.stages, stageIndex + 1, run),
        );
        run.completedAt = new Date().toISOString();
        this.updateRunStatus(run, "aborted", config);
        logger.error("Pipeline aborted", {
          stage: stage.id,
          stageIndex,
          cause,
          skipped: definition.stages.slice(stageIndex + 1).map((s) => s.id),
        });
        return this.buildPipelineResult(
          run,
          definition,
          stageResults,
          startTime,
          "aborted",
          stageResult.error,
        );
      }

      logger.info("Stage succeeded", {
        stage: stage.id,
        durationMs: stageResult.durationMs,
      });
    }

    // ── All stages succeeded ────────────────────────────────────────────

    run.completedAt = new Date().toISOString();
    this.updateRunStatus(run, "completed", config);
    logger.info("Pipeline completed", { durationMs: Date.now() - startTime });
    return this.buildPipelineResult(
      run,
      definition,
      stageResults,
      startTime,
      "completed",
    );
  }

  // ── Stage Execution ─────────────────────────────────────────────────────

  private async executeStage(
    stage: StageDefinition,
    stageIndex: number,
    executor: QueryExecutor,
    run: Run,
    logger: Logger,
  ): Promise<StageResult> {
    const outcome = await runStage(stage, executor, logger);

    if (outcome.status === "succeeded") {
      return {
        stageIndex,
        stage,
        status: "succeeded",
        durationMs: outcome.durationMs,
        ...(outcome.gate ? { gate: outcome.gate } : {}),
      };
    }

    return {
      stageIndex,
      stage,
      status: "failed",
      durationMs: outcome.durationMs,
      cause: outcome.cause,
      ...(outcome.gate ? { gate: outcome.gate } : {}),
      error: new PipelineError(
        outcome.cause,
        "STAGE_FAILED",
        run.id,
        stageIndex,
        outcome.error,
      ),
    };
  }

  private skipRemaining(
    stages: readonly StageDefinition[],
    fromIndex: number,
    run: Run,
  ): StageResult[] {
    const skipped: StageResult[] = [];
    for (const [i, stage] of stages.entries()) {
      if (i < fromIndex) continue;
      run.stageStatuses[i] = "skipped";
      skipped.push({
        stageIndex: i,
        stage,
        status: "skipped",
        durationMs: 0,
      });
    }
    return skipped;
  }

  private abortBeforeStart(
    definition: PipelineDefinition,
    run: Run,
    config: PipelineEngineConfig,
    error: PipelineError,
    startTime: number,
  ): PipelineResult {
    const stageResults = this.skipRemaining(definition.stages, 0, run);
    run.completedAt = new Date().toISOString();
    this.updateRunStatus(run, "aborted", config);
    return this.buildPipelineResult(
      run,
      definition,
      stageResults,
      startTime,
      "aborted",
      error,
    );
  }

  // ── Helpers ─────────────────────────────────────────────────────────────

  private updateRunStatus(
    run: Run,
    status: RunStatus,
    config: PipelineEngineConfig,
  ): void {
    run.status = status;
    this.safeCallback(this.logger, "onStatusChange", () =>
      config.onStatusChange?.(run),
    );
  }

  /** Callbacks are observers: a throwing one is logged and the run goes on. */
  private safeCallback(logger: Logger, name: string, fn: () => void): void {
    try {
      fn();
    } catch (err: unknown) {
      logger.warn("Pipeline callback threw", {
        callback: name,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private buildPipelineResult(
    run: Run,
    definition: PipelineDefinition,
    stageResults: readonly StageResult[],
    startTime: number,
    status: PipelineResult["status"],
    error?: PipelineError,
  ): PipelineResult {
    return {
      runId: run.id,
      pipelineId: definition.id,
      status,
      stageResults,
      totalDurationMs: Date.now() - startTime,
      run,
      ...(run.abortedAt ? { abortedAt: run.abortedAt } : {}),
      ...(error ? { error } : {}),
    };
  }
}

// ── Run Construction ────────────────────────────────────────────────────────

export function createRun(definition: PipelineDefinition, runId?: string): Run {
  return {
    id: runId ?? generateRunId(definition.id),
    pipelineId: definition.id,
    startedAt: new Date().toISOString(),
    completedAt: null,
    status: "pending",
    currentStageIndex: 0,
    stageStatuses: definition.stages.map(() => "pending"),
    abortedAt: null,
  };
}

function validateStages(
  stages: readonly StageDefinition[],
  runId: string,
): PipelineError | null {
  if (stages.length === 0) {
    return new PipelineError("Pipeline has no stages", "NO_STAGES", runId);
  }

  const seen = new Set<string>();
  for (const [i, { id }] of stages.entries()) {
    if (seen.has(id)) {
      return new PipelineError(
        `Duplicate stage id "${id}"`,
        "DUPLICATE_STAGE_ID",
        runId,
        i,
      );
    }
    seen.add(id);
  }
  return null;
}
