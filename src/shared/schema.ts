/**
 * JSON Schema registry.
 *
 * Loads every `*.schema.json` under `tools/fedsearch/schema/` into one
 * ajv instance.  Schemas reference each other by `$id`, and callers
 * validate against the id (`site.schema.json`).
 */
import { createRequire } from "node:module";
import { readFileSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { schemaDir as defaultSchemaDir } from "./paths.js";

// ajv & ajv-formats are CJS packages; use createRequire for clean interop
// under both tsc (NodeNext resolution) and tsx (ESM runtime).
const require = createRequire(import.meta.url);
const Ajv = require("ajv").default as typeof import("ajv").default;
const addFormats = require("ajv-formats").default as typeof import("ajv-formats").default;

type IdentifiedSchema = { $id: string };

function hasId(value: unknown): value is IdentifiedSchema {
  return typeof value === "object" && value !== null && "$id" in value && typeof value.$id === "string";
}

export type SchemaCheck<T> = { ok: true; value: T } | { ok: false; errors: string[] };

export class SchemaRegistry {
  private readonly ajv: InstanceType<typeof Ajv>;

  constructor(dir: string = defaultSchemaDir()) {
    this.ajv = new Ajv({ allErrors: true, strict: true, allowUnionTypes: true, useDefaults: true });
    addFormats(this.ajv);

    const files = readdirSync(dir).filter((f) => f.endsWith(".schema.json"));
    for (const file of files) {
      const schema: unknown = JSON.parse(readFileSync(join(dir, file), "utf-8"));
      if (!hasId(schema)) {
        throw new Error(`Schema file ${file} has no $id`);
      }
      this.ajv.addSchema(schema, schema.$id);
    }
  }

  /**
   * Validate `data` against `schemaRef`.  Defaults declared in the
   * schema are filled into `data` in place.
   */
  check<T>(schemaRef: string, data: unknown): SchemaCheck<T> {
    if (this.ajv.validate<T>(schemaRef, data)) {
      return { ok: true, value: data };
    }
    const errors = (this.ajv.errors ?? []).map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`);
    return { ok: false, errors };
  }

  /** Like {@link check} but throws with every schema message. */
  parse<T>(schemaRef: string, data: unknown, label: string): T {
    const result = this.check<T>(schemaRef, data);
    if (!result.ok) {
      throw new Error(`Invalid ${label}:\n  ${result.errors.join("\n  ")}`);
    }
    return result.value;
  }
}

let shared: SchemaRegistry | undefined;

/** Process-wide registry over the packaged schemas. */
export function schemaRegistry(): SchemaRegistry {
  shared ??= new SchemaRegistry();
  return shared;
}
