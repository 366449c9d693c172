export { SequentialPipelineEngine, createRun } from "./pipeline-engine.ts";
export { runStage } from "./stage-runner.ts";
export { generateRunId } from "./id.ts";

export {
  type PipelineEngineConfig,
  type StageOutcome,
  type StageResult,
  type PipelineResult,
  type PipelineErrorCode,
  PipelineError,
} from "./types.ts";

export {
  buildRunReport,
  renderRunReport,
  type RunReport,
  type StageReport,
  type AssertionReportRow,
} from "./report.ts";
