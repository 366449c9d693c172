// ── Action Command ──────────────────────────────────────────────────────────

/**
 * Opaque command handed to the warehouse. `values` bind to `$1..$n`
 * placeholders; commands without values may contain several statements.
 */
export interface ActionCommand {
  readonly text: string;
  readonly values?: readonly string[];
}
