import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { LOG_LEVELS, LOG_FORMATS } from "./observability/logger.ts";
import type { LogLevel, LogFormat } from "./observability/logger.ts";
import type { WarehouseConnectionConfig } from "./warehouse/postgres-executor.ts";

// ── Runtime Configuration ──────────────────────────────────────────────────

export interface RuntimeConfig {
  readonly warehouse: WarehouseConnectionConfig;
  readonly pipelineFile: string;
  readonly scriptsDir: string;
  /** Source directories handed to the Bronze loader, as the database server sees them. */
  readonly sources: {
    readonly crmDir: string | undefined;
    readonly erpDir: string | undefined;
  };
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
  };
}

// ── Config Error ───────────────────────────────────────────────────────────

export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(
    message: string,
    readonly field: string,
  ) {
    super(message);
  }
}

// ── Constants ──────────────────────────────────────────────────────────────

const PROJECT_ROOT = fileURLToPath(new URL("..", import.meta.url));
const APPLICATION_NAME = "warehouse-quality-pipeline";

// ── Helpers ────────────────────────────────────────────────────────────────

function parseIntField(
  raw: string | undefined,
  field: string,
  fallback: number,
  min: number,
): number {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(
      `${field} must be an integer >= ${min}, got "${raw}".`,
      field,
    );
  }
  return value;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some((f) => f === value);
}

// ── Load Config ────────────────────────────────────────────────────────────

/**
 * Load runtime configuration from environment variables.
 *
 * @param envOverrides Optional env-var-style overrides for testing.
 *   Keys are env var names (e.g. "PGHOST"), values are strings.
 * @returns Frozen RuntimeConfig object.
 * @throws ConfigError if a field is invalid.
 */
export function loadConfig(
  envOverrides?: Record<string, string | undefined>,
): RuntimeConfig {
  const env = (key: string): string | undefined =>
    envOverrides?.[key] ?? process.env[key];
  const optional = (key: string): string | undefined => {
    const value = env(key)?.trim();
    return value ? value : undefined;
  };

  // ── Warehouse ──────────────────────────────────────────────────────────
  const connectionString = optional("DATABASE_URL");
  const port = parseIntField(env("PGPORT"), "PGPORT", 5432, 1);
  if (port > 65535) {
    throw new ConfigError(`PGPORT must be <= 65535, got "${port}".`, "PGPORT");
  }
  const statementTimeoutMs = parseIntField(
    env("STATEMENT_TIMEOUT_MS"),
    "STATEMENT_TIMEOUT_MS",
    0,
    0,
  );

  const warehouse: WarehouseConnectionConfig = {
    ...(connectionString ? { connectionString } : {}),
    host: optional("PGHOST") ?? "localhost",
    port,
    database: optional("PGDATABASE") ?? "datawarehouse",
    user: optional("PGUSER") ?? "postgres",
    password: env("PGPASSWORD") || undefined,
    statementTimeoutMs,
    applicationName: APPLICATION_NAME,
  };

  // ── Pipeline Files ─────────────────────────────────────────────────────
  const pipelineFileRaw = optional("PIPELINE_FILE");
  const pipelineFile = pipelineFileRaw
    ? resolve(process.cwd(), pipelineFileRaw)
    : resolve(PROJECT_ROOT, "pipelines/medallion.yaml");

  const scriptsDirRaw = optional("SCRIPTS_DIR");
  const scriptsDir = scriptsDirRaw
    ? resolve(process.cwd(), scriptsDirRaw)
    : resolve(PROJECT_ROOT, "scripts");

  // ── Logging ────────────────────────────────────────────────────────────
  const logLevel = (env("LOG_LEVEL") || "info").trim();
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      `LOG_LEVEL must be one of: ${LOG_LEVELS.join(", ")}. Got "${logLevel}".`,
      "LOG_LEVEL",
    );
  }

  const logFormat = (env("LOG_FORMAT") || "pretty").trim();
  if (!isLogFormat(logFormat)) {
    throw new ConfigError(
      `LOG_FORMAT must be one of: ${LOG_FORMATS.join(", ")}. Got "${logFormat}".`,
      "LOG_FORMAT",
    );
  }

  // ── Build and freeze ──────────────────────────────────────────────────
  return Object.freeze({
    warehouse: Object.freeze(warehouse),
    pipelineFile,
    scriptsDir,
    sources: Object.freeze({
      crmDir: optional("CRM_SOURCE_DIR"),
      erpDir: optional("ERP_SOURCE_DIR"),
    }),
    logging: Object.freeze({ level: logLevel, format: logFormat }),
  });
}
