/**
 * warehouse-quality-pipeline
 *
 * Runs an ordered Bronze → Silver → Gold warehouse load where quality gates
 * stop the run at the first failing data-quality assertion.
 */
export const VERSION = "0.1.0";

export * from "./src/index.ts";
