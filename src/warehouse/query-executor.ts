import type { ActionCommand } from "../types/warehouse.ts";

// ── Query Executor ──────────────────────────────────────────────────────────

/**
 * The only seam between the pipeline and the warehouse.
 *
 * `execute` runs a data action and resolves once the warehouse reports the
 * command complete. `queryScalar` runs a read-only query and resolves with the
 * first column of the first row, or `null` when there is no row or the value
 * is SQL NULL. Both reject with {@link QueryExecutionError}.
 */
export interface QueryExecutor {
  execute(command: ActionCommand): Promise<void>;
  queryScalar(sql: string): Promise<number | null>;
}

// ── Query Execution Error ───────────────────────────────────────────────────

export type QueryExecutionErrorCode =
  | "QUERY_FAILED"
  | "NON_NUMERIC_RESULT"
  | "CONNECTION_FAILED";

export class QueryExecutionError extends Error {
  override readonly name = "QueryExecutionError";

  constructor(
    message: string,
    public readonly code: QueryExecutionErrorCode,
    /** SQLSTATE reported by the server, when there is one. */
    public readonly sqlState?: string,
    public override readonly cause?: Error,
  ) {
    super(message);
  }
}

/**
 * Normalize anything a driver rejects with. The driver's message is kept
 * verbatim so stage causes show exactly what the warehouse said.
 */
export function toQueryExecutionError(
  err: unknown,
  code: QueryExecutionErrorCode = "QUERY_FAILED",
): QueryExecutionError {
  if (err instanceof QueryExecutionError) {
    return err;
  }
  if (err instanceof Error) {
    const sqlState =
      "code" in err && typeof err.code === "string" ? err.code : undefined;
    return new QueryExecutionError(err.message, code, sqlState, err);
  }
  return new QueryExecutionError(String(err), code);
}

// ── Scalar Coercion ─────────────────────────────────────────────────────────

/**
 * Turn a raw driver value into a number. Postgres sends COUNT(*) as a bigint
 * string and NUMERIC as a decimal string.
 */
export function coerceScalar(raw: unknown): number | null {
  if (raw === null || raw === undefined) {
    return null;
  }

  let value: number;
  if (typeof raw === "number") {
    value = raw;
  } else if (typeof raw === "bigint") {
    value = Number(raw);
  } else if (typeof raw === "string" && raw.trim() !== "") {
    value = Number(raw);
  } else {
    value = Number.NaN;
  }

  if (!Number.isFinite(value)) {
    throw new QueryExecutionError(
      `Scalar result is not numeric: ${JSON.stringify(typeof raw === "bigint" ? raw.toString() : raw)}`,
      "NON_NUMERIC_RESULT",
    );
  }
  return value;
}
