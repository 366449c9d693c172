import { randomBytes } from "node:crypto";

/**
 * Generate a pipeline run ID: "run-{pipelineId}-{YYYYMMDD}-{6-char-hex}"
 * Example: "run-medallion-20251022-a1b2c3"
 */
export function generateRunId(pipelineId: string): string {
  const dateStr = new Date().toISOString().slice(0, 10).replace(/-/g, "");
  const hex = randomBytes(3).toString("hex");
  return `run-${pipelineId}-${dateStr}-${hex}`;
}
