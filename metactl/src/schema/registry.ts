import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { SchemaObject } from "ajv";
import { ConfigurationError } from "../core/errors.js";
import { createAjv, type AjvInstance, type ValidateFunction } from "./ajv.js";

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: SchemaObject;
};

/**
 * Schema registry — discovers all JSON Schemas in a directory and registers
 * them with one ajv instance, so schemas can `$ref` each other by `$id`.
 * Library entries get `include_in_classpath` filled from its schema default.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private readonly ajv: AjvInstance = createAjv();

  constructor(private readonly schemaDir: string) {}

  /** Discover and register all *.schema.json files in the schema directory. */
  load(): void {
    if (!fs.existsSync(this.schemaDir)) {
      throw new ConfigurationError(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json")).sort();

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: SchemaObject = JSON.parse(fs.readFileSync(filePath, "utf8"));

      // "version-info.schema.json" → "version-info"
      const name = file.replace(/\.schema\.json$/, "");
      const version = extractVersion(schema) ?? "1.0.0";

      this.ajv.addSchema(schema);
      this.entries.set(name, { name, version, filePath, schema });
    }
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  /** All registered schema names, sorted. */
  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** name → version */
  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) {
      result[name] = entry.version;
    }
    return result;
  }

  /** Typed validator for a named schema. ajv compiles each schema once and caches it. */
  validator<T>(name: string): ValidateFunction<T> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new ConfigurationError(`Schema not found: ${name}`);
    }
    return this.ajv.compile<T>(entry.schema);
  }

  /** Validate data against a named schema. Returns errors or null. */
  validate(name: string, data: unknown): { valid: boolean; errors: string | null } {
    const validate = this.validator<unknown>(name);
    const valid = validate(data);
    return {
      valid,
      errors: valid ? null : this.ajv.errorsText(validate.errors),
    };
  }

  errorsText(validate: Pick<ValidateFunction, "errors">): string {
    return this.ajv.errorsText(validate.errors);
  }
}

/** Extract a semver-like version from the schema `$id` ("...@1.0.0.json"). */
function extractVersion(schema: SchemaObject): string | null {
  if (typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
    if (m) return m[1];
  }
  return null;
}

/** Create and load a registry from the default schemas directory. */
export function createRegistry(schemaDir?: string): SchemaRegistry {
  const registry = new SchemaRegistry(schemaDir ?? DEFAULT_SCHEMA_DIR);
  registry.load();
  return registry;
}

let shared: SchemaRegistry | undefined;

export function sharedRegistry(): SchemaRegistry {
  if (!shared) shared = createRegistry();
  return shared;
}
