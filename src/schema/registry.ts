import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/**
 * Schema registry — discovers the JSON Schemas for persisted files and
 * compiles validators on demand.
 */
export class SchemaRegistry {
  private schemas = new Map<string, unknown>();
  private validators = new Map<string, AjvValidateFn>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));

    for (const file of files) {
      const schema: unknown = JSON.parse(fs.readFileSync(path.join(this.schemaDir, file), "utf8"));
      // "history-entry.schema.json" → "history-entry"
      this.schemas.set(file.replace(/\.schema\.json$/, ""), schema);
    }

    this.ajv = await loadAjv();
  }

  /**
   * Compile and cache a validator. The returned function narrows its argument
   * to `T`; callers pick the `T` that the named schema describes.
   */
  async getValidator<T>(name: string): Promise<AjvValidateFn<T>> {
    if (!this.schemas.has(name)) {
      throw new Error(`Schema not found: ${name}`);
    }

    const ajv = this.ajv ?? (await loadAjv());
    this.ajv = ajv;

    const cached = this.validators.get(name);
    const validate = cached ?? ajv.compile(this.schemas.get(name));
    if (!cached) this.validators.set(name, validate);

    return (data: unknown): data is T => validate(data);
  }
}

/** Create and load a registry from the bundled schemas directory. */
export async function createRegistry(schemaDir: string = DEFAULT_SCHEMA_DIR): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir);
  await registry.load();
  return registry;
}
