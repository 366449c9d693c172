// ── Component Health ─────────────────────────────────────────────────────────

export const COMPONENT_STATUSES = ["healthy", "degraded", "offline"] as const;
export type ComponentStatus = (typeof COMPONENT_STATUSES)[number];

export interface ComponentHealth {
  readonly name: string;
  readonly status: ComponentStatus;
  readonly lastCheckedAt: string;
  readonly details: Record<string, unknown>;
}
