import type { ActionCommand } from "../types/warehouse.ts";
import {
  QueryExecutionError,
  type QueryExecutor,
} from "./query-executor.ts";

// ── Call Log ────────────────────────────────────────────────────────────────

export type ExecutorCall =
  | { readonly type: "execute"; readonly command: ActionCommand }
  | { readonly type: "query"; readonly sql: string };

// ── In-Memory Query Executor (for testing) ──────────────────────────────────

/**
 * Scripted stand-in for a warehouse session.
 *
 * Scalars and failures are keyed by exact query/command text. An unscripted
 * query resolves `null`; an unscripted command succeeds.
 */
export class InMemoryQueryExecutor implements QueryExecutor {
  readonly calls: ExecutorCall[] = [];
  private readonly scalars = new Map<string, number | null>();
  private readonly queryFailures = new Map<string, string>();
  private readonly commandFailures = new Map<string, string>();

  setScalar(sql: string, value: number | null): this {
    this.scalars.set(sql, value);
    return this;
  }

  failQuery(sql: string, message: string): this {
    this.queryFailures.set(sql, message);
    return this;
  }

  failCommand(text: string, message: string): this {
    this.commandFailures.set(text, message);
    return this;
  }

  async execute(command: ActionCommand): Promise<void> {
    this.calls.push({ type: "execute", command });
    const failure = this.commandFailures.get(command.text);
    if (failure !== undefined) {
      throw new QueryExecutionError(failure, "QUERY_FAILED");
    }
  }

  async queryScalar(sql: string): Promise<number | null> {
    this.calls.push({ type: "query", sql });
    const failure = this.queryFailures.get(sql);
    if (failure !== undefined) {
      throw new QueryExecutionError(failure, "QUERY_FAILED");
    }
    return this.scalars.get(sql) ?? null;
  }

  get executedCommands(): readonly string[] {
    return this.calls.flatMap((c) => (c.type === "execute" ? [c.command.text] : []));
  }

  get executedQueries(): readonly string[] {
    return this.calls.flatMap((c) => (c.type === "query" ? [c.sql] : []));
  }
}
