import type { GateOutcome } from "../types/assertion.ts";
import type { StageDefinition, StageStatus } from "../types/stage.ts";
import type { AbortPoint, Run } from "../types/run.ts";

// ── Pipeline Error ──────────────────────────────────────────────────────────

export type PipelineErrorCode =
  | "STAGE_FAILED"
  | "NO_STAGES"
  | "DUPLICATE_STAGE_ID"
  | "UNKNOWN";

export class PipelineError extends Error {
  override readonly name = "PipelineError";

  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    public readonly runId: string,
    public readonly stageIndex?: number,
    public override readonly cause?: Error,
  ) {
    super(message);
  }
}

// ── Stage Outcome ───────────────────────────────────────────────────────────

/**
 * What running one stage produced. `cause` is set exactly when the stage
 * failed and is carried to the run's abort point unchanged.
 */
export type StageOutcome =
  | {
      readonly status: "succeeded";
      readonly durationMs: number;
      readonly gate?: GateOutcome;
    }
  | {
      readonly status: "failed";
      readonly durationMs: number;
      readonly cause: string;
      readonly error?: Error;
      readonly gate?: GateOutcome;
    };

// ── Stage Result ────────────────────────────────────────────────────────────

export interface StageResult {
  readonly stageIndex: number;
  readonly stage: StageDefinition;
  readonly status: Exclude<StageStatus, "pending" | "running">;
  readonly durationMs: number;
  readonly cause?: string;
  readonly gate?: GateOutcome;
  readonly error?: PipelineError;
}

// ── Pipeline Result ─────────────────────────────────────────────────────────

export interface PipelineResult {
  readonly runId: string;
  readonly pipelineId: string;
  readonly status: "completed" | "aborted";
  /** One entry per stage in definition order, skipped stages included. */
  readonly stageResults: readonly StageResult[];
  readonly totalDurationMs: number;
  readonly abortedAt?: AbortPoint;
  readonly error?: PipelineError;
  readonly run: Run;
}

// ── Pipeline Engine Config ──────────────────────────────────────────────────

export interface PipelineEngineConfig {
  readonly runId?: string;
  readonly onStageStart?: (stage: StageDefinition, stageIndex: number) => void;
  readonly onStageComplete?: (stageResult: StageResult) => void;
  readonly onStatusChange?: (run: Run) => void;
}
