import type { RuntimeConfig } from "./config.ts";
import { createLogger } from "./observability/logger.ts";
import type { Logger } from "./observability/logger.ts";
import type { PipelineDefinition } from "./types/run.ts";
import type { ComponentHealth } from "./types/health.ts";
import { SequentialPipelineEngine } from "./pipeline/pipeline-engine.ts";
import type { PipelineEngineConfig, PipelineResult } from "./pipeline/types.ts";
import { loadPipelineDefinition } from "./definitions/pipeline-loader.ts";
import { FileScriptSource } from "./definitions/script-source.ts";
import type { ScriptSource } from "./definitions/script-source.ts";
import { toWarehousePath } from "./definitions/paths.ts";
import {
  createPostgresSession,
  type WarehouseConnectionConfig,
  type WarehouseSession,
} from "./warehouse/postgres-executor.ts";

// ── Application Interface ──────────────────────────────────────────────────

export interface Application {
  readonly config: RuntimeConfig;
  readonly logger: Logger;
  readonly engine: SequentialPipelineEngine;

  /** Read and resolve the configured pipeline file. */
  loadDefinition(): Promise<PipelineDefinition>;
  /** Open a session, run its health query, and close it again. */
  checkWarehouse(): Promise<ComponentHealth>;
  /** Execute one run on a fresh warehouse session, closed afterwards. */
  run(
    definition: PipelineDefinition,
    engineConfig?: PipelineEngineConfig,
  ): Promise<PipelineResult>;
}

// ── Dependency Overrides ───────────────────────────────────────────────────

export type SessionFactory = (
  config: WarehouseConnectionConfig,
  logger: Logger,
) => Promise<WarehouseSession>;

export interface BootstrapOverrides {
  readonly logger?: Logger;
  readonly openSession?: SessionFactory;
  readonly scripts?: ScriptSource;
}

// ── Parameters ─────────────────────────────────────────────────────────────

/**
 * Placeholder values available to pipeline files. Source directories are
 * converted to the slash-terminated form the Bronze loader expects.
 */
export function pipelineParams(config: RuntimeConfig): Record<string, string> {
  const params: Record<string, string> = {};
  if (config.sources.crmDir) {
    params["crm_source_dir"] = toWarehousePath(config.sources.crmDir);
  }
  if (config.sources.erpDir) {
    params["erp_source_dir"] = toWarehousePath(config.sources.erpDir);
  }
  return params;
}

// ── Bootstrap ──────────────────────────────────────────────────────────────

/**
 * Wire all modules together with real implementations.
 * This is the composition root: the single place where dependency injection happens.
 *
 * @param config Runtime configuration (from loadConfig()).
 * @param overrides Replacements for the logger, warehouse session or script source.
 */
export function bootstrap(
  config: RuntimeConfig,
  overrides: BootstrapOverrides = {},
): Application {
  const logger =
    overrides.logger ??
    createLogger({
      level: config.logging.level,
      format: config.logging.format,
      base: { app: "warehouse-pipeline" },
    });

  logger.info("Bootstrapping application", {
    pipelineFile: config.pipelineFile,
    scriptsDir: config.scriptsDir,
    warehouseHost: config.warehouse.connectionString
      ? "(connection string)"
      : `${config.warehouse.host}:${config.warehouse.port}`,
    database: config.warehouse.database,
  });

  const engine = new SequentialPipelineEngine(logger);
  const scripts = overrides.scripts ?? new FileScriptSource(config.scriptsDir);
  const openSession = overrides.openSession ?? createPostgresSession;

  return {
    config,
    logger,
    engine,

    loadDefinition() {
      return loadPipelineDefinition(config.pipelineFile, {
        scripts,
        params: pipelineParams(config),
      });
    },

    async checkWarehouse() {
      const session = await openSession(config.warehouse, logger);
      try {
        return await session.checkHealth();
      } finally {
        await session.close();
      }
    },

    async run(definition, engineConfig) {
      const session = await openSession(config.warehouse, logger);
      try {
        return await engine.execute(definition, session.executor, engineConfig);
      } finally {
        await session.close();
      }
    },
  };
}
