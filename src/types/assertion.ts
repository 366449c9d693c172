// ── Comparators ─────────────────────────────────────────────────────────────

export const COMPARATORS = [
  "equals",
  "greater_or_equal",
  "less_or_equal",
] as const;

export type Comparator = (typeof COMPARATORS)[number];

// ── Assertion Spec ──────────────────────────────────────────────────────────

/**
 * A named data-quality rule. `query` must return a single numeric scalar;
 * `name` is unique within its gate only.
 */
export interface AssertionSpec {
  readonly name: string;
  readonly query: string;
  readonly comparator: Comparator;
  readonly expected: number;
}

// ── Gate Policy ─────────────────────────────────────────────────────────────

/**
 * `fail_fast` stops at the first failing assertion and leaves the rest
 * `not_run`. `collect_all` evaluates every assertion but still reports the
 * first failure in declared order as the gate's cause.
 */
export const GATE_POLICIES = ["fail_fast", "collect_all"] as const;
export type GatePolicy = (typeof GATE_POLICIES)[number];

export const DEFAULT_GATE_POLICY: GatePolicy = "fail_fast";

// ── Assertion Outcome ───────────────────────────────────────────────────────

export type AssertionFailureKind = "assertion_failure" | "missing_result";

export type AssertionOutcome =
  | { readonly status: "not_run" }
  | { readonly status: "passed"; readonly actual: number }
  | {
      readonly status: "failed";
      readonly kind: "assertion_failure";
      readonly actual: number;
      readonly reason: string;
    }
  | {
      readonly status: "failed";
      readonly kind: "missing_result";
      readonly reason: string;
    }
  | {
      readonly status: "error";
      readonly kind: "query_execution";
      readonly reason: string;
      readonly cause: Error;
    };

export type AssertionStatus = AssertionOutcome["status"];

/** What a single evaluation can produce. */
export type EvaluatedOutcome = Exclude<AssertionOutcome, { readonly status: "not_run" }>;

export interface AssertionResult {
  readonly assertion: AssertionSpec;
  readonly outcome: AssertionOutcome;
}

// ── Gate Outcome ────────────────────────────────────────────────────────────

export interface GateOutcome {
  readonly passed: boolean;
  readonly policy: GatePolicy;
  readonly results: readonly AssertionResult[];
  /** Reason of the first failing assertion in declared order. */
  readonly cause?: string;
}
