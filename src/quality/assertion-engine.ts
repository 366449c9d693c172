import type {
  AssertionOutcome,
  AssertionResult,
  AssertionSpec,
  Comparator,
  EvaluatedOutcome,
  GateOutcome,
  GatePolicy,
} from "../types/assertion.ts";
import { DEFAULT_GATE_POLICY } from "../types/assertion.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import {
  toQueryExecutionError,
  type QueryExecutor,
} from "../warehouse/query-executor.ts";

// ── Comparison ──────────────────────────────────────────────────────────────

const COMPARATOR_SYMBOLS: Record<Comparator, string> = {
  equals: "=",
  greater_or_equal: ">=",
  less_or_equal: "<=",
};

export function compare(
  comparator: Comparator,
  actual: number,
  expected: number,
): boolean {
  switch (comparator) {
    case "equals":
      return actual === expected;
    case "greater_or_equal":
      return actual >= expected;
    case "less_or_equal":
      return actual <= expected;
  }
}

/**
 * "0" for equality, ">= 95" for thresholds.
 */
export function describeExpectation(
  comparator: Comparator,
  expected: number,
): string {
  return comparator === "equals"
    ? String(expected)
    : `${COMPARATOR_SYMBOLS[comparator]} ${expected}`;
}

// ── Single Assertion ────────────────────────────────────────────────────────

/**
 * Run one assertion's query and judge the result. Never throws: executor
 * failures become an `error` outcome and a missing value is a failure, not 0.
 */
export async function evaluateAssertion(
  assertion: AssertionSpec,
  executor: QueryExecutor,
): Promise<EvaluatedOutcome> {
  let actual: number | null;
  try {
    actual = await executor.queryScalar(assertion.query);
  } catch (err: unknown) {
    const cause = toQueryExecutionError(err);
    return {
      status: "error",
      kind: "query_execution",
      reason: `${assertion.name}: query failed: ${cause.message}`,
      cause,
    };
  }

  if (actual === null) {
    return {
      status: "failed",
      kind: "missing_result",
      reason: `${assertion.name}: query returned no value`,
    };
  }

  if (compare(assertion.comparator, actual, assertion.expected)) {
    return { status: "passed", actual };
  }

  return {
    status: "failed",
    kind: "assertion_failure",
    actual,
    reason: `${assertion.name}: expected ${describeExpectation(assertion.comparator, assertion.expected)}, got ${actual}`,
  };
}

// ── Gate ────────────────────────────────────────────────────────────────────

export interface GateOptions {
  readonly policy?: GatePolicy;
  readonly logger?: Logger;
}

/**
 * Evaluate a gate's assertions in declared order.
 *
 * Under `fail_fast` the first failing assertion ends the gate and the rest
 * stay `not_run`. Nothing is retried.
 */
export async function evaluateGate(
  assertions: readonly AssertionSpec[],
  executor: QueryExecutor,
  options: GateOptions = {},
): Promise<GateOutcome> {
  const policy = options.policy ?? DEFAULT_GATE_POLICY;
  const logger = options.logger ?? NULL_LOGGER;

  const outcomes: AssertionOutcome[] = assertions.map(() => ({
    status: "not_run",
  }));
  let cause: string | undefined;

  for (const [i, assertion] of assertions.entries()) {
    logger.debug("Running assertion", { assertion: assertion.name, index: i });

    const outcome = await evaluateAssertion(assertion, executor);
    outcomes[i] = outcome;

    if (outcome.status === "passed") {
      logger.info("Assertion passed", {
        assertion: assertion.name,
        actual: outcome.actual,
        expected: describeExpectation(assertion.comparator, assertion.expected),
      });
      continue;
    }

    logger.error("Assertion did not pass", {
      assertion: assertion.name,
      status: outcome.status,
      reason: outcome.reason,
    });
    cause ??= outcome.reason;

    if (policy === "fail_fast") {
      break;
    }
  }

  const results: AssertionResult[] = assertions.map((assertion, i) => ({
    assertion,
    outcome: outcomes[i] ?? { status: "not_run" },
  }));

  return {
    passed: cause === undefined,
    policy,
    results,
    ...(cause !== undefined ? { cause } : {}),
  };
}
