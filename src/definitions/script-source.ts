import { readFile } from "node:fs/promises";
import { isAbsolute, relative, resolve, sep } from "node:path";
import { DefinitionError } from "./errors.ts";

// ── Script Source ────────────────────────────────────────────────────────────

/**
 * Supplies the body of script-backed action stages. The text is opaque:
 * it is never parsed or validated here.
 */
export interface ScriptSource {
  read(scriptPath: string): Promise<string>;
}

// ── File Script Source ───────────────────────────────────────────────────────

export class FileScriptSource implements ScriptSource {
  constructor(private readonly scriptsDir: string) {}

  async read(scriptPath: string): Promise<string> {
    const fullPath = resolve(this.scriptsDir, scriptPath);
    const rel = relative(this.scriptsDir, fullPath);
    if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new DefinitionError(
        `Script path escapes the scripts directory: ${scriptPath}`,
        "VALIDATION_ERROR",
        [`Invalid script path: ${scriptPath}`],
        fullPath,
      );
    }

    try {
      return await readFile(fullPath, "utf-8");
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        throw new DefinitionError(
          `SQL script not found: ${fullPath}`,
          "NOT_FOUND",
          [`File not found: ${fullPath}`],
          fullPath,
        );
      }
      throw new DefinitionError(
        `Failed to read SQL script: ${fullPath}`,
        "READ_FAILED",
        [err instanceof Error ? err.message : String(err)],
        fullPath,
      );
    }
  }
}

// ── In-Memory Script Source (for testing) ────────────────────────────────────

export class InMemoryScriptSource implements ScriptSource {
  constructor(private readonly scripts: Readonly<Record<string, string>>) {}

  async read(scriptPath: string): Promise<string> {
    const body = Object.hasOwn(this.scripts, scriptPath)
      ? this.scripts[scriptPath]
      : undefined;
    if (body === undefined) {
      throw new DefinitionError(
        `SQL script not found: ${scriptPath}`,
        "NOT_FOUND",
        [`File not found: ${scriptPath}`],
        scriptPath,
      );
    }
    return body;
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
