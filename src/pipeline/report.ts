import type {
  AssertionResult,
  AssertionStatus,
  Comparator,
} from "../types/assertion.ts";
import type { AbortPoint } from "../types/run.ts";
import type { StageKind, StageStatus } from "../types/stage.ts";
import { describeExpectation } from "../quality/assertion-engine.ts";
import type { PipelineResult, StageResult } from "./types.ts";

// ── Run Report ──────────────────────────────────────────────────────────────
// Deterministic view of a run: no ids, timestamps or durations, so re-running
// against an unchanged warehouse yields an equal report.

export interface AssertionReportRow {
  readonly name: string;
  readonly comparator: Comparator;
  readonly expected: number;
  readonly actual: number | null;
  readonly outcome: AssertionStatus;
  readonly reason?: string;
}

export interface StageReport {
  readonly stageIndex: number;
  readonly id: string;
  readonly kind: StageKind;
  readonly status: StageStatus;
  readonly cause?: string;
  readonly assertions?: readonly AssertionReportRow[];
}

export interface RunReport {
  readonly pipelineId: string;
  readonly status: PipelineResult["status"];
  readonly stages: readonly StageReport[];
  readonly abortedAt: AbortPoint | null;
  readonly skippedStages: readonly string[];
  /** Set when the run was rejected before any stage started. */
  readonly rejection?: string;
}

// ── Build ───────────────────────────────────────────────────────────────────

function toAssertionRow({ assertion, outcome }: AssertionResult): AssertionReportRow {
  const base = {
    name: assertion.name,
    comparator: assertion.comparator,
    expected: assertion.expected,
    outcome: outcome.status,
  };
  switch (outcome.status) {
    case "not_run":
      return { ...base, actual: null };
    case "passed":
      return { ...base, actual: outcome.actual };
    case "failed":
      return {
        ...base,
        actual: outcome.kind === "assertion_failure" ? outcome.actual : null,
        reason: outcome.reason,
      };
    case "error":
      return { ...base, actual: null, reason: outcome.reason };
  }
}

function toStageReport(result: StageResult): StageReport {
  return {
    stageIndex: result.stageIndex,
    id: result.stage.id,
    kind: result.stage.kind,
    status: result.status,
    ...(result.cause !== undefined ? { cause: result.cause } : {}),
    ...(result.gate
      ? { assertions: result.gate.results.map(toAssertionRow) }
      : {}),
  };
}

export function buildRunReport(result: PipelineResult): RunReport {
  const stages = result.stageResults.map(toStageReport);
  const rejected = result.status === "aborted" && result.abortedAt === undefined;
  return {
    pipelineId: result.pipelineId,
    status: result.status,
    stages,
    abortedAt: result.abortedAt ?? null,
    skippedStages: stages.filter((s) => s.status === "skipped").map((s) => s.id),
    ...(rejected && result.error ? { rejection: result.error.message } : {}),
  };
}

// ── Render ──────────────────────────────────────────────────────────────────

function renderAssertionRow(row: AssertionReportRow): string {
  const expectation = describeExpectation(row.comparator, row.expected);
  const actual = row.actual === null ? "n/a" : String(row.actual);
  const line = `    ${row.outcome.toUpperCase().padEnd(7)} ${row.name} (expected ${expectation}, actual ${actual})`;
  return row.outcome === "error" && row.reason ? `${line}: ${row.reason}` : line;
}

/**
 * Render a report as a flat, ordered list of log lines suitable for a
 * console, a CI log or an API response body.
 */
export function renderRunReport(report: RunReport): string[] {
  const total = report.stages.length;
  const lines: string[] = [`Pipeline ${report.pipelineId}: ${report.status}`];

  for (const stage of report.stages) {
    const head = `[${stage.stageIndex + 1}/${total}] ${stage.id} (${stage.kind}) ${stage.status}`;
    lines.push(stage.cause !== undefined ? `${head}: ${stage.cause}` : head);
    for (const row of stage.assertions ?? []) {
      lines.push(renderAssertionRow(row));
    }
  }

  if (report.rejection !== undefined) {
    lines.push(`Rejected before start: ${report.rejection}`);
  } else if (report.abortedAt) {
    const { stageIndex, stageId, cause } = report.abortedAt;
    lines.push(`Aborted at stage ${stageIndex + 1} (${stageId}): ${cause}`);
  } else {
    lines.push(`Completed: ${total}/${total} stages succeeded`);
  }

  if (report.skippedStages.length > 0) {
    lines.push(`Skipped: ${report.skippedStages.join(", ")}`);
  }

  return lines;
}
