import fs from "node:fs";
import path from "node:path";
import { loadAjv, type AjvInstance } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  filePath: string;
  schema: unknown;
};

export type SchemaCheck<T> = { valid: true; value: T } | { valid: false; errors: string };

export const SCHEMA_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../schemas");

/**
 * Discovers and loads all JSON Schemas from a directory.
 * Compiled validators are cached by Ajv itself, keyed on the schema object.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));

      // "package-descriptor.schema.json" → "package-descriptor"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, filePath, schema });
    }

    this.ajv = await loadAjv();
  }

  /** List all registered schema names. */
  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** Validate data against a named schema, narrowing it to `T` on success. */
  check<T>(name: string, data: unknown): SchemaCheck<T> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }
    if (!this.ajv) {
      throw new Error("Schema registry used before load()");
    }

    const validate = this.ajv.compile<T>(entry.schema);
    if (validate(data)) {
      return { valid: true, value: data };
    }
    return { valid: false, errors: this.ajv.errorsText(validate.errors) };
  }
}

/** Create and load a registry from the default schemas directory. */
export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? SCHEMA_DIR);
  await registry.load();
  return registry;
}
