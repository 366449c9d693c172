import type { AssertionSpec, GatePolicy } from "./assertion.ts";
import type { ActionCommand } from "./warehouse.ts";

// ── Stage Kinds ─────────────────────────────────────────────────────────────

export const STAGE_KINDS = ["action", "quality_gate"] as const;
export type StageKind = (typeof STAGE_KINDS)[number];

// ── Stage Definitions ───────────────────────────────────────────────────────

interface StageBase {
  readonly id: string;
  readonly description?: string;
}

export interface ActionStageDefinition extends StageBase {
  readonly kind: "action";
  readonly action: ActionCommand;
}

export interface QualityGateStageDefinition extends StageBase {
  readonly kind: "quality_gate";
  readonly assertions: readonly AssertionSpec[];
  readonly policy?: GatePolicy;
}

export type StageDefinition = ActionStageDefinition | QualityGateStageDefinition;

// ── Stage Status ────────────────────────────────────────────────────────────

export const STAGE_STATUSES = [
  "pending",
  "running",
  "succeeded",
  "failed",
  "skipped",
] as const;

export type StageStatus = (typeof STAGE_STATUSES)[number];
