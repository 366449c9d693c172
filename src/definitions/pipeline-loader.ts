import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import type { AssertionSpec, Comparator, GatePolicy } from "../types/assertion.ts";
import { COMPARATORS, GATE_POLICIES } from "../types/assertion.ts";
import type { PipelineDefinition } from "../types/run.ts";
import type { StageDefinition } from "../types/stage.ts";
import type { ActionCommand } from "../types/warehouse.ts";
import { DefinitionError } from "./errors.ts";
import type { ScriptSource } from "./script-source.ts";

// ── YAML Document Shape ─────────────────────────────────────────────────────
// Validated form of a pipeline file before action sources are resolved.

export type ActionSource =
  | {
      readonly type: "procedure";
      readonly name: string;
      readonly args: readonly string[];
    }
  | { readonly type: "script"; readonly path: string }
  | { readonly type: "sql"; readonly text: string };

export type StageDocument =
  | {
      readonly id: string;
      readonly description?: string;
      readonly kind: "action";
      readonly source: ActionSource;
    }
  | {
      readonly id: string;
      readonly description?: string;
      readonly kind: "quality_gate";
      readonly assertions: readonly AssertionSpec[];
      readonly policy?: GatePolicy;
    };

export interface PipelineDocument {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly stages: readonly StageDocument[];
}

// ── Resolve Options ─────────────────────────────────────────────────────────

export interface ResolveOptions {
  readonly scripts: ScriptSource;
  /** Values for `{{name}}` placeholders in procedure arguments. */
  readonly params?: Readonly<Record<string, string>>;
}

// ── Constants ───────────────────────────────────────────────────────────────

const ACTION_KEYS = ["procedure", "script", "sql"] as const;
const PROCEDURE_NAME = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;
const PLACEHOLDER = /\{\{\s*([A-Za-z0-9_]+)\s*\}\}/g;
const DEFAULT_COMPARATOR: Comparator = "equals";
const DEFAULT_EXPECTED = 0;

// ── Helpers ─────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

function isComparator(value: unknown): value is Comparator {
  return COMPARATORS.some((c) => c === value);
}

function isGatePolicy(value: unknown): value is GatePolicy {
  return GATE_POLICIES.some((p) => p === value);
}

// ── Validation ──────────────────────────────────────────────────────────────

function parseAssertion(
  raw: unknown,
  where: string,
  errors: string[],
): AssertionSpec | null {
  if (!isRecord(raw)) {
    errors.push(`${where}: must be a mapping`);
    return null;
  }
  const before = errors.length;

  const name = raw["name"];
  if (!isNonEmptyString(name)) {
    errors.push(`${where}: "name" must be a non-empty string`);
  }
  const query = raw["query"];
  if (!isNonEmptyString(query)) {
    errors.push(`${where}: "query" must be a non-empty string`);
  }
  const comparator = raw["comparator"] ?? DEFAULT_COMPARATOR;
  if (!isComparator(comparator)) {
    errors.push(
      `${where}: "comparator" must be one of ${COMPARATORS.join(", ")}, got ${JSON.stringify(comparator)}`,
    );
  }
  const expected = raw["expected"] ?? DEFAULT_EXPECTED;
  if (typeof expected !== "number" || !Number.isFinite(expected)) {
    errors.push(`${where}: "expected" must be a number, got ${JSON.stringify(expected)}`);
  }

  if (
    errors.length > before ||
    !isNonEmptyString(name) ||
    !isNonEmptyString(query) ||
    !isComparator(comparator) ||
    typeof expected !== "number"
  ) {
    return null;
  }
  return { name: name.trim(), query: query.trim(), comparator, expected };
}

function parseActionSource(
  raw: Record<string, unknown>,
  key: (typeof ACTION_KEYS)[number],
  where: string,
  errors: string[],
): ActionSource | null {
  const value = raw[key];
  switch (key) {
    case "procedure": {
      if (!isRecord(value) || !isNonEmptyString(value["name"])) {
        errors.push(`${where}: "procedure.name" must be a non-empty string`);
        return null;
      }
      const name = value["name"].trim();
      if (!PROCEDURE_NAME.test(name)) {
        errors.push(`${where}: procedure name "${name}" is not a valid [schema.]name`);
        return null;
      }
      const rawArgs = value["args"] ?? [];
      if (!Array.isArray(rawArgs) || !rawArgs.every((a) => typeof a === "string")) {
        errors.push(`${where}: "procedure.args" must be a list of strings`);
        return null;
      }
      return { type: "procedure", name, args: rawArgs };
    }
    case "script":
      if (!isNonEmptyString(value)) {
        errors.push(`${where}: "script" must be a non-empty path`);
        return null;
      }
      return { type: "script", path: value.trim() };
    case "sql":
      if (!isNonEmptyString(value)) {
        errors.push(`${where}: "sql" must be a non-empty string`);
        return null;
      }
      return { type: "sql", text: value.trim() };
  }
}

function parseStage(
  raw: unknown,
  index: number,
  errors: string[],
): StageDocument | null {
  const where = `stages[${index}]`;
  if (!isRecord(raw)) {
    errors.push(`${where}: must be a mapping`);
    return null;
  }

  const id = raw["id"];
  if (!isNonEmptyString(id)) {
    errors.push(`${where}: "id" must be a non-empty string`);
    return null;
  }
  const label = `${where} (${id})`;
  const description = isNonEmptyString(raw["description"])
    ? { description: raw["description"].trim() }
    : {};

  const actionKeys = ACTION_KEYS.filter((k) => raw[k] !== undefined);
  const hasAssertions = raw["assertions"] !== undefined;
  const declared = actionKeys.length + (hasAssertions ? 1 : 0);
  if (declared !== 1) {
    errors.push(
      `${label}: must declare exactly one of procedure, script, sql or assertions (found ${declared})`,
    );
    return null;
  }

  if (hasAssertions) {
    const rawAssertions = raw["assertions"];
    if (!Array.isArray(rawAssertions) || rawAssertions.length === 0) {
      errors.push(`${label}: "assertions" must be a non-empty list`);
      return null;
    }
    const policy = raw["policy"];
    if (policy !== undefined && !isGatePolicy(policy)) {
      errors.push(
        `${label}: "policy" must be one of ${GATE_POLICIES.join(", ")}, got ${JSON.stringify(policy)}`,
      );
    }

    const assertions: AssertionSpec[] = [];
    const names = new Set<string>();
    rawAssertions.forEach((item: unknown, i: number) => {
      const assertion = parseAssertion(item, `${label}.assertions[${i}]`, errors);
      if (!assertion) {
        return;
      }
      if (names.has(assertion.name)) {
        errors.push(`${label}: duplicate assertion name "${assertion.name}"`);
        return;
      }
      names.add(assertion.name);
      assertions.push(assertion);
    });

    return {
      id: id.trim(),
      ...description,
      kind: "quality_gate",
      assertions,
      ...(isGatePolicy(policy) ? { policy } : {}),
    };
  }

  const [key] = actionKeys;
  if (key === undefined) {
    return null;
  }
  const source = parseActionSource(raw, key, label, errors);
  if (!source) {
    return null;
  }
  return { id: id.trim(), ...description, kind: "action", source };
}

/**
 * Validate a parsed YAML value as a pipeline document. Every problem is
 * collected before throwing so one edit pass can fix the file.
 */
export function parsePipelineDocument(raw: unknown, path?: string): PipelineDocument {
  const errors: string[] = [];

  if (!isRecord(raw)) {
    throw new DefinitionError(
      "Pipeline definition must be a YAML mapping",
      "VALIDATION_ERROR",
      ["Top level is not a mapping"],
      path,
    );
  }

  const id = raw["id"];
  if (!isNonEmptyString(id)) {
    errors.push(`"id" must be a non-empty string`);
  }
  const name = isNonEmptyString(raw["name"]) ? raw["name"].trim() : undefined;
  const description = isNonEmptyString(raw["description"])
    ? raw["description"].trim()
    : "";

  const rawStages = raw["stages"];
  const stages: StageDocument[] = [];
  if (!Array.isArray(rawStages) || rawStages.length === 0) {
    errors.push(`"stages" must be a non-empty list`);
  } else {
    const ids = new Set<string>();
    rawStages.forEach((item: unknown, i: number) => {
      const stage = parseStage(item, i, errors);
      if (!stage) {
        return;
      }
      if (ids.has(stage.id)) {
        errors.push(`stages[${i}]: duplicate stage id "${stage.id}"`);
        return;
      }
      ids.add(stage.id);
      stages.push(stage);
    });
  }

  if (errors.length > 0 || !isNonEmptyString(id)) {
    throw new DefinitionError(
      `Invalid pipeline definition${path ? `: ${path}` : ""} (${errors.length} problem${errors.length === 1 ? "" : "s"})`,
      "VALIDATION_ERROR",
      errors,
      path,
    );
  }

  const pipelineId = id.trim();
  return { id: pipelineId, name: name ?? pipelineId, description, stages };
}

// ── Resolution ──────────────────────────────────────────────────────────────

export function substituteParams(
  template: string,
  params: Readonly<Record<string, string>>,
): string {
  return template.replace(PLACEHOLDER, (_match, key: string) => {
    const value = Object.hasOwn(params, key) ? params[key] : undefined;
    if (value === undefined) {
      throw new DefinitionError(
        `Unknown parameter "{{${key}}}"`,
        "UNKNOWN_PARAMETER",
        [`No value supplied for parameter "${key}"`],
      );
    }
    return value;
  });
}

async function resolveAction(
  source: ActionSource,
  options: ResolveOptions,
): Promise<ActionCommand> {
  switch (source.type) {
    case "procedure": {
      const values = source.args.map((arg) => substituteParams(arg, options.params ?? {}));
      const placeholders = values.map((_v, i) => `$${i + 1}`).join(", ");
      return values.length > 0
        ? { text: `CALL ${source.name}(${placeholders});`, values }
        : { text: `CALL ${source.name}();` };
    }
    case "script":
      return { text: await options.scripts.read(source.path) };
    case "sql":
      return { text: source.text };
  }
}

/**
 * Turn a validated document into an immutable pipeline definition:
 * procedure calls become parameterized commands and scripts are read once.
 */
export async function resolvePipelineDefinition(
  doc: PipelineDocument,
  options: ResolveOptions,
): Promise<PipelineDefinition> {
  const stages: StageDefinition[] = [];
  for (const stage of doc.stages) {
    if (stage.kind === "quality_gate") {
      stages.push(stage);
      continue;
    }
    const { source, ...rest } = stage;
    stages.push({ ...rest, action: await resolveAction(source, options) });
  }
  return Object.freeze({
    id: doc.id,
    name: doc.name,
    description: doc.description,
    stages: Object.freeze(stages),
  });
}

// ── Load From File ──────────────────────────────────────────────────────────

/**
 * Read, validate and resolve a pipeline definition YAML file.
 */
export async function loadPipelineDefinition(
  yamlPath: string,
  options: ResolveOptions,
): Promise<PipelineDefinition> {
  let content: string;
  try {
    content = await readFile(yamlPath, "utf-8");
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new DefinitionError(
        `Pipeline definition not found: ${yamlPath}`,
        "NOT_FOUND",
        [`File not found: ${yamlPath}`],
        yamlPath,
      );
    }
    throw new DefinitionError(
      `Failed to read pipeline definition: ${yamlPath}`,
      "READ_FAILED",
      [err instanceof Error ? err.message : String(err)],
      yamlPath,
    );
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err: unknown) {
    throw new DefinitionError(
      `Pipeline definition is not valid YAML: ${yamlPath}`,
      "PARSE_ERROR",
      [err instanceof Error ? err.message : String(err)],
      yamlPath,
    );
  }

  return resolvePipelineDefinition(parsePipelineDocument(raw, yamlPath), options);
}
