import pg from "pg";
import type { ActionCommand } from "../types/warehouse.ts";
import type { ComponentHealth } from "../types/health.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { Logger } from "../observability/logger.ts";
import {
  coerceScalar,
  toQueryExecutionError,
  type QueryExecutor,
} from "./query-executor.ts";

// ── Connection Config ───────────────────────────────────────────────────────

export interface WarehouseConnectionConfig {
  /** Takes precedence over the discrete fields when set. */
  readonly connectionString?: string;
  readonly host: string;
  readonly port: number;
  readonly database: string;
  readonly user: string;
  readonly password: string | undefined;
  readonly statementTimeoutMs: number;
  readonly applicationName: string;
}

// ── Postgres Client Interface ───────────────────────────────────────────────
// Abstraction over a single pg session for testability.

export interface PostgresClient {
  /** Run a statement (or a multi-statement script when `values` is absent). */
  command(text: string, values?: readonly string[]): Promise<void>;
  /** Run a query and return its first row in column order. */
  firstRow(text: string): Promise<readonly unknown[] | undefined>;
  end(): Promise<void>;
}

// ── Postgres Query Executor ─────────────────────────────────────────────────

export class PostgresQueryExecutor implements QueryExecutor {
  private readonly logger: Logger;

  constructor(
    private readonly client: PostgresClient,
    logger?: Logger,
  ) {
    this.logger = (logger ?? NULL_LOGGER).child({ module: "postgres-executor" });
  }

  async execute(command: ActionCommand): Promise<void> {
    this.logger.debug("Executing command", {
      length: command.text.length,
      boundValues: command.values?.length ?? 0,
    });
    try {
      await this.client.command(command.text, command.values);
    } catch (err: unknown) {
      throw toQueryExecutionError(err);
    }
  }

  async queryScalar(sql: string): Promise<number | null> {
    let row: readonly unknown[] | undefined;
    try {
      row = await this.client.firstRow(sql);
    } catch (err: unknown) {
      throw toQueryExecutionError(err);
    }
    return coerceScalar(row?.[0]);
  }
}

// ── Warehouse Session ───────────────────────────────────────────────────────

/**
 * One connection owned by one run. Runs never share sessions.
 */
export interface WarehouseSession {
  readonly executor: QueryExecutor;
  checkHealth(): Promise<ComponentHealth>;
  close(): Promise<void>;
}

class WarehouseSessionImpl implements WarehouseSession {
  readonly executor: QueryExecutor;
  private closed = false;

  constructor(
    private readonly client: PostgresClient,
    private readonly logger: Logger,
  ) {
    this.executor = new PostgresQueryExecutor(client, logger);
  }

  async checkHealth(): Promise<ComponentHealth> {
    const now = new Date().toISOString();

    try {
      const row = await this.client.firstRow("SELECT 1");
      return {
        name: "warehouse",
        status: row?.[0] === 1 ? "healthy" : "degraded",
        lastCheckedAt: now,
        details: { closed: this.closed },
      };
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      return {
        name: "warehouse",
        status: "offline",
        lastCheckedAt: now,
        details: { error: message, closed: this.closed },
      };
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      await this.client.end();
    } catch (err: unknown) {
      this.logger.warn("Failed to close warehouse session", {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

// ── Connection Errors ───────────────────────────────────────────────────────

/** The part of `pg.Client` that reports errors raised while no query is active. */
export interface ConnectionErrorSource {
  on(event: "error", listener: (err: Error) => void): unknown;
}

/**
 * A dropped connection between queries is emitted as `error` on the client.
 * Log it; the next command or query on the session then rejects and fails
 * its stage.
 */
export function listenForConnectionErrors(
  client: ConnectionErrorSource,
  logger: Logger,
): void {
  client.on("error", (err) => {
    logger.error("Warehouse connection error", { error: err.message });
  });
}

// ── Factory Functions ───────────────────────────────────────────────────────

function wrapPgClient(client: pg.Client): PostgresClient {
  return {
    async command(text, values) {
      if (values && values.length > 0) {
        await client.query(text, [...values]);
      } else {
        await client.query(text);
      }
    },
    async firstRow(text) {
      const result = await client.query({ text, rowMode: "array" });
      return result.rows[0];
    },
    async end() {
      await client.end();
    },
  };
}

/**
 * Open a dedicated warehouse session using pg.
 */
export async function createPostgresSession(
  config: WarehouseConnectionConfig,
  logger?: Logger,
): Promise<WarehouseSession> {
  const sessionLogger = (logger ?? NULL_LOGGER).child({ module: "warehouse" });
  const client = new pg.Client({
    ...(config.connectionString
      ? { connectionString: config.connectionString }
      : {
          host: config.host,
          port: config.port,
          database: config.database,
          user: config.user,
          password: config.password,
        }),
    statement_timeout: config.statementTimeoutMs,
    application_name: config.applicationName,
  });
  listenForConnectionErrors(client, sessionLogger);

  try {
    await client.connect();
  } catch (err: unknown) {
    throw toQueryExecutionError(err, "CONNECTION_FAILED");
  }

  sessionLogger.info("Warehouse session opened", {
    host: config.connectionString ? "(connection string)" : config.host,
    database: config.database,
  });

  return new WarehouseSessionImpl(wrapPgClient(client), sessionLogger);
}

/**
 * Create a session around an existing client.
 * Useful for testing with mock clients.
 */
export function createSessionFromClient(
  client: PostgresClient,
  logger?: Logger,
): WarehouseSession {
  return new WarehouseSessionImpl(
    client,
    (logger ?? NULL_LOGGER).child({ module: "warehouse" }),
  );
}
