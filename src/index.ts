// ── Types ─────────────────────────────────────────────────────────────────────
export * from "./types/index.ts";

// ── Warehouse ─────────────────────────────────────────────────────────────────
export * from "./warehouse/index.ts";

// ── Quality ───────────────────────────────────────────────────────────────────
export * from "./quality/index.ts";

// ── Pipeline ──────────────────────────────────────────────────────────────────
export * from "./pipeline/index.ts";

// ── Definitions ───────────────────────────────────────────────────────────────
export * from "./definitions/index.ts";

// ── Observability ─────────────────────────────────────────────────────────────
export * from "./observability/index.ts";

// ── Runtime ───────────────────────────────────────────────────────────────────
export { loadConfig, ConfigError, type RuntimeConfig } from "./config.ts";
export {
  bootstrap,
  pipelineParams,
  type Application,
  type BootstrapOverrides,
  type SessionFactory,
} from "./bootstrap.ts";
