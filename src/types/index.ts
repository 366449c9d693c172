// ── Type re-exports ──────────────────────────────────────────────────────────
export type {
  Comparator,
  AssertionSpec,
  GatePolicy,
  AssertionFailureKind,
  AssertionOutcome,
  AssertionStatus,
  EvaluatedOutcome,
  AssertionResult,
  GateOutcome,
} from "./assertion.ts";

export type {
  StageKind,
  ActionStageDefinition,
  QualityGateStageDefinition,
  StageDefinition,
  StageStatus,
} from "./stage.ts";

export type {
  PipelineDefinition,
  RunStatus,
  AbortPoint,
  Run,
} from "./run.ts";

export type { ActionCommand } from "./warehouse.ts";

export type { ComponentStatus, ComponentHealth } from "./health.ts";

// ── Value re-exports ─────────────────────────────────────────────────────────
export {
  COMPARATORS,
  GATE_POLICIES,
  DEFAULT_GATE_POLICY,
} from "./assertion.ts";
export { STAGE_KINDS, STAGE_STATUSES } from "./stage.ts";
export { RUN_STATUSES } from "./run.ts";
export { COMPONENT_STATUSES } from "./health.ts";
