import { loadAjv } from "../schema/ajv.js";
import type { IndexGuardConfig } from "../types/config.js";
import { loadConfig } from "./loader.js";

const CONFIG_SCHEMA = {
  type: "object",
  required: [
    "schema_version",
    "new_file_prefix",
    "index_root",
    "allowed_paths",
    "index_repository",
    "index_branch",
    "index_cache_dir",
    "forge_url_template",
    "glyphs",
    "manifest",
  ],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    new_file_prefix: { type: "string", minLength: 1, pattern: "^[^/]+$" },
    index_root: { type: "string", minLength: 1, pattern: "^[^/]+$" },
    allowed_paths: { type: "array", items: { type: "string", minLength: 1 } },
    index_repository: { type: "string", format: "uri" },
    index_branch: { type: "string", minLength: 1 },
    index_cache_dir: { type: "string", minLength: 1 },
    forge_url_template: { type: "string", minLength: 1 },
    glyphs: { type: "string", enum: ["emoji", "ascii"] },
    manifest: {
      type: "object",
      required: ["file_name", "command", "timeout_ms"],
      properties: {
        file_name: { type: "string", minLength: 1, pattern: "^[^/]+$" },
        command: { type: "array", items: { type: "string", minLength: 1 }, minItems: 1 },
        timeout_ms: { type: "integer", minimum: 1 },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: IndexGuardConfig }
  | { valid: false; errors: string };

/** Validate a loaded config against the config schema. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const ajv = await loadAjv();
  const validate = ajv.compile<IndexGuardConfig>(CONFIG_SCHEMA);
  if (validate(config)) {
    return { valid: true, config };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}

/** Load and validate in one step; invalid configuration is thrown. */
export async function resolveConfig(envName?: string, configDir?: string): Promise<IndexGuardConfig> {
  const res = await validateConfig(loadConfig(envName, configDir));
  if (!res.valid) {
    throw new Error(`Invalid configuration: ${res.errors}`);
  }
  return res.config;
}
