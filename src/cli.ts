import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { loadConfig, ConfigError } from "./config.ts";
import { bootstrap } from "./bootstrap.ts";
import type { RuntimeConfig } from "./config.ts";
import type { PipelineDefinition } from "./types/run.ts";
import type { ComponentHealth } from "./types/health.ts";
import { DEFAULT_GATE_POLICY } from "./types/assertion.ts";
import { DefinitionError } from "./definitions/errors.ts";
import { describeExpectation } from "./quality/assertion-engine.ts";
import { buildRunReport, renderRunReport } from "./pipeline/report.ts";

// ── Parsed CLI Arguments ───────────────────────────────────────────────────

export interface ParsedArgs {
  pipeline: string | null;
  dryRun: boolean;
  json: boolean;
  check: boolean;
  help: boolean;
}

// ── Argument Parser ────────────────────────────────────────────────────────

/**
 * Parse CLI arguments into a structured ParsedArgs object.
 *
 * @param argv Arguments after the script name (e.g. process.argv.slice(2))
 * @throws Error if arguments are invalid
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {
    pipeline: null,
    dryRun: false,
    json: false,
    check: false,
    help: false,
  };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    if (arg === undefined) {
      break;
    }

    if (arg === "--help" || arg === "-h") {
      result.help = true;
      i++;
    } else if (arg === "--dry-run") {
      result.dryRun = true;
      i++;
    } else if (arg === "--json") {
      result.json = true;
      i++;
    } else if (arg === "--check") {
      result.check = true;
      i++;
    } else if (arg === "--pipeline") {
      const value = argv[i + 1];
      if (!value || value.startsWith("--")) {
        throw new Error("--pipeline requires a file path argument");
      }
      result.pipeline = value;
      i += 2;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return result;
}

// ── Plan Rendering ─────────────────────────────────────────────────────────

const MAX_COMMAND_PREVIEW = 72;

function previewCommand(text: string): string {
  const firstLine = text.trim().split("\n")[0] ?? "";
  const multiLine = text.trim().includes("\n");
  if (firstLine.length > MAX_COMMAND_PREVIEW) {
    return `${firstLine.slice(0, MAX_COMMAND_PREVIEW)}…`;
  }
  return multiLine ? `${firstLine} …` : firstLine;
}

/**
 * Describe what a run would do without touching the warehouse.
 */
export function renderPlan(definition: PipelineDefinition): string[] {
  const total = definition.stages.length;
  const lines = [`Pipeline ${definition.id}: ${definition.name} (${total} stages)`];

  definition.stages.forEach((stage, i) => {
    const head = `[${i + 1}/${total}] ${stage.id}`;
    if (stage.kind === "action") {
      const bound = stage.action.values?.length ?? 0;
      lines.push(
        `${head} (action) ${previewCommand(stage.action.text)}${bound > 0 ? ` [${bound} bound value${bound === 1 ? "" : "s"}]` : ""}`,
      );
      return;
    }
    lines.push(
      `${head} (quality_gate, ${stage.policy ?? DEFAULT_GATE_POLICY}) ${stage.assertions.length} assertion${stage.assertions.length === 1 ? "" : "s"}`,
    );
    for (const assertion of stage.assertions) {
      lines.push(
        `    - ${assertion.name} (expected ${describeExpectation(assertion.comparator, assertion.expected)})`,
      );
    }
  });

  return lines;
}

/**
 * One line per health check: status, then the failure when there is one.
 */
export function renderHealth(health: ComponentHealth): string {
  const error = health.details["error"];
  return typeof error === "string"
    ? `${health.name}: ${health.status} (${error})`
    : `${health.name}: ${health.status}`;
}

// ── Help Text ──────────────────────────────────────────────────────────────

const HELP_TEXT = `
Warehouse Quality Pipeline

Usage:
  npm start                              Run the configured pipeline once
  npm start -- --pipeline <file.yaml>    Run a specific pipeline file

Options:
  --dry-run        Print the resolved stages without connecting
  --json           Print the run report as JSON instead of log lines
  --check          Check the warehouse connection and exit
  --help, -h       Show this help message

Environment:
  DATABASE_URL or PGHOST/PGPORT/PGDATABASE/PGUSER/PGPASSWORD
  PIPELINE_FILE, SCRIPTS_DIR, CRM_SOURCE_DIR, ERP_SOURCE_DIR
  STATEMENT_TIMEOUT_MS, LOG_LEVEL, LOG_FORMAT
`.trim();

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  // Parse arguments
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err: unknown) {
    console.error(
      `Error: ${err instanceof Error ? err.message : String(err)}`,
    );
    console.error("Run with --help for usage information.");
    process.exit(1);
    return;
  }

  // Help mode
  if (args.help) {
    console.log(HELP_TEXT);
    process.exit(0);
    return;
  }

  // Load config
  let config: RuntimeConfig;
  try {
    config = loadConfig(
      args.pipeline ? { PIPELINE_FILE: args.pipeline } : undefined,
    );
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
    } else {
      console.error(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    process.exit(1);
    return;
  }

  const app = bootstrap(config);

  // ── Connection Check ────────────────────────────────────────────────────
  if (args.check) {
    try {
      const health = await app.checkWarehouse();
      console.log(args.json ? JSON.stringify(health, null, 2) : renderHealth(health));
      process.exit(health.status === "healthy" ? 0 : 1);
    } catch (err: unknown) {
      app.logger.error("Warehouse connection failed", {
        error: err instanceof Error ? err.message : String(err),
      });
      process.exit(1);
    }
    return;
  }

  // Load pipeline definition
  let definition: PipelineDefinition;
  try {
    definition = await app.loadDefinition();
  } catch (err: unknown) {
    if (err instanceof DefinitionError) {
      app.logger.error(err.message, { code: err.code, problems: err.errors });
    } else {
      app.logger.error("Failed to load pipeline definition", {
        error: err instanceof Error ? err.message : String(err),
      });
    }
    process.exit(1);
    return;
  }

  // ── Dry Run ─────────────────────────────────────────────────────────────
  if (args.dryRun) {
    console.log(renderPlan(definition).join("\n"));
    process.exit(0);
    return;
  }

  // ── Run ─────────────────────────────────────────────────────────────────
  try {
    const result = await app.run(definition);
    const report = buildRunReport(result);

    if (args.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      console.log(renderRunReport(report).join("\n"));
    }

    app.logger.info("Run finished", {
      runId: result.runId,
      status: result.status,
      durationMs: result.totalDurationMs,
    });
    process.exit(result.status === "completed" ? 0 : 1);
  } catch (err: unknown) {
    app.logger.error("Run could not start", {
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  }
}

// Run only when executed as the entry point (not when imported for testing)
const entryPath = process.argv[1];
if (entryPath && resolve(entryPath) === fileURLToPath(import.meta.url)) {
  main().catch((err: unknown) => {
    console.error(
      "Fatal: Failed to start:",
      err instanceof Error ? err.message : String(err),
    );
    process.exit(1);
  });
}
