import type { PipelineDefinition } from "../../types/run.ts";
import type { StageDefinition } from "../../types/stage.ts";
import { InMemoryQueryExecutor } from "../../warehouse/in-memory-executor.ts";

// ── Commands and Queries ────────────────────────────────────────────────────

export const LOAD_BRONZE = "CALL bronze.load_bronze($1, $2);";
export const LOAD_SILVER = "CALL silver.load_silver();";
export const GOLD_SCRIPT = "CREATE VIEW gold.dim_customers AS SELECT 1;";

export const SILVER_QUERIES = {
  duplicateCustomers: "SELECT silver_duplicate_customers",
  nullCustomerIds: "SELECT silver_null_customer_ids",
} as const;

export const GOLD_QUERIES = {
  nullCustomerKeys: "SELECT gold_null_customer_keys",
  completeness: "SELECT gold_completeness",
} as const;

// ── Definition Fixtures ─────────────────────────────────────────────────────

export function medallionStages(): StageDefinition[] {
  return [
    {
      id: "load_bronze",
      kind: "action",
      action: { text: LOAD_BRONZE, values: ["/data/crm/", "/data/erp/"] },
    },
    { id: "load_silver", kind: "action", action: { text: LOAD_SILVER } },
    {
      id: "check_silver_quality",
      kind: "quality_gate",
      assertions: [
        {
          name: "duplicate customers",
          query: SILVER_QUERIES.duplicateCustomers,
          comparator: "equals",
          expected: 0,
        },
        {
          name: "null customer ids",
          query: SILVER_QUERIES.nullCustomerIds,
          comparator: "equals",
          expected: 0,
        },
      ],
    },
    { id: "create_gold_views", kind: "action", action: { text: GOLD_SCRIPT } },
    {
      id: "check_gold_quality",
      kind: "quality_gate",
      assertions: [
        {
          name: "null customer keys",
          query: GOLD_QUERIES.nullCustomerKeys,
          comparator: "equals",
          expected: 0,
        },
        {
          name: "completeness",
          query: GOLD_QUERIES.completeness,
          comparator: "greater_or_equal",
          expected: 95,
        },
      ],
    },
  ];
}

export function createTestDefinition(
  overrides?: Partial<PipelineDefinition>,
): PipelineDefinition {
  return {
    id: "medallion-test",
    name: "Medallion Test",
    description: "A five stage pipeline for unit testing",
    stages: medallionStages(),
    ...overrides,
  };
}

// ── Executor Fixtures ───────────────────────────────────────────────────────

/**
 * An executor under which every medallion assertion passes.
 */
export function createHealthyWarehouse(): InMemoryQueryExecutor {
  return new InMemoryQueryExecutor()
    .setScalar(SILVER_QUERIES.duplicateCustomers, 0)
    .setScalar(SILVER_QUERIES.nullCustomerIds, 0)
    .setScalar(GOLD_QUERIES.nullCustomerKeys, 0)
    .setScalar(GOLD_QUERIES.completeness, 98.5);
}
