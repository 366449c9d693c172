// ── Definition Error Codes ───────────────────────────────────────────────────

export type DefinitionErrorCode =
  | "NOT_FOUND"
  | "READ_FAILED"
  | "PARSE_ERROR"
  | "VALIDATION_ERROR"
  | "UNKNOWN_PARAMETER";

// ── Definition Error ─────────────────────────────────────────────────────────

export class DefinitionError extends Error {
  override readonly name = "DefinitionError";

  constructor(
    message: string,
    public readonly code: DefinitionErrorCode,
    public readonly errors: readonly string[] = [],
    public readonly path?: string,
  ) {
    super(message);
  }
}
