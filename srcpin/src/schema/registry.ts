import fs from "node:fs";
import path from "node:path";
import { loadAjv, type AjvInstance } from "./ajv.js";

export type SchemaName = "references" | "policy";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type SchemaCheck<T> = { valid: true; value: T } | { valid: false; errors: string };

/**
 * Schema registry: discovers the *.schema.json documents in a directory and
 * compiles validators on demand.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));
    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      // "policy.schema.json" → "policy"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, version: extractVersion(schema) ?? "1.0.0", filePath, schema });
    }

    this.ajv = await loadAjv();
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /**
   * Validate `data` against a named schema; a valid result carries the data
   * under the type the schema describes. Ajv caches compiled schemas by
   * object, so repeated checks compile once.
   */
  async check<T>(name: SchemaName, data: unknown): Promise<SchemaCheck<T>> {
    const entry = this.entries.get(name);
    if (!entry) throw new Error(`Schema not found: ${name}`);
    if (!this.ajv) this.ajv = await loadAjv();

    const validate = this.ajv.compile<T>(entry.schema);
    if (validate(data)) return { valid: true, value: data };
    return { valid: false, errors: this.ajv.errorsText(validate.errors) };
  }
}

function extractVersion(schema: unknown): string | null {
  if (typeof schema !== "object" || schema === null) return null;
  if ("version" in schema && typeof schema.version === "string") return schema.version;
  if ("$id" in schema && typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
    if (m) return m[1];
  }
  return null;
}

export const SCHEMA_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../schemas");

export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? SCHEMA_DIR);
  await registry.load();
  return registry;
}
