import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { createRegistry } from "../schema/registry.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
};

export type ValidateResult = { ok: true } | { ok: false; errors: Diagnostic[] };

const REQUIRED_SCHEMAS = ["manifest", "package-descriptor"];

function diag(level: Diagnostic["level"], code: string, message: string, filePath?: string): Diagnostic {
  return filePath === undefined ? { level, code, message } : { level, code, message, path: filePath };
}

/** Check the layered configuration and the schema directory. */
export async function validateAll(opts: {
  configDir?: string;
  envName?: string;
  schemaDir?: string;
}): Promise<ValidateResult> {
  const errors: Diagnostic[] = [];

  try {
    const res = await validateConfig(loadConfig(opts.envName, opts.configDir));
    if (!res.valid) {
      errors.push(diag("error", "CONFIG_INVALID", `Config invalid: ${res.errors}`, opts.configDir));
    }
  } catch (e) {
    errors.push(
      diag("error", "CONFIG_READ_FAILED", `Failed to read config: ${e instanceof Error ? e.message : String(e)}`, opts.configDir),
    );
  }

  try {
    const registry = await createRegistry(opts.schemaDir);
    const names = registry.names();
    for (const required of REQUIRED_SCHEMAS) {
      if (!names.includes(required)) {
        errors.push(diag("error", "SCHEMA_MISSING", `Missing schema: ${required}.schema.json`, opts.schemaDir));
      }
    }
  } catch (e) {
    errors.push(
      diag("error", "SCHEMA_LOAD_FAILED", `Failed to load schemas: ${e instanceof Error ? e.message : String(e)}`, opts.schemaDir),
    );
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true };
}
