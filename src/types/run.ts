import type { StageDefinition, StageStatus } from "./stage.ts";

// ── Pipeline Definition ─────────────────────────────────────────────────────

export interface PipelineDefinition {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly stages: readonly StageDefinition[];
}

// ── Run Status ──────────────────────────────────────────────────────────────

export const RUN_STATUSES = ["pending", "running", "completed", "aborted"] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

// ── Abort Point ─────────────────────────────────────────────────────────────

export interface AbortPoint {
  /** Zero-based position of the failing stage. */
  readonly stageIndex: number;
  readonly stageId: string;
  readonly cause: string;
}

// ── Run (runtime instance) ──────────────────────────────────────────────────

export interface Run {
  readonly id: string;
  readonly pipelineId: string;
  readonly startedAt: string;
  completedAt: string | null;
  status: RunStatus;
  currentStageIndex: number;
  readonly stageStatuses: StageStatus[];
  abortedAt: AbortPoint | null;
}
