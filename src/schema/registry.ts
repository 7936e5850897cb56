import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createCompiler, describeFailure, type CompiledSchema, type SchemaCompiler } from "./ajv.js";

const BUNDLED_SCHEMAS = fileURLToPath(new URL("../../schemas", import.meta.url));
const SCHEMA_SUFFIX = ".schema.json";
const FALLBACK_VERSION = "1.0.0";

type LoadedSchema = {
  version: string;
  document: unknown;
  check: CompiledSchema | null;
};

export type SchemaValidation = { valid: boolean; errors: string | null };

/** `urn:provenant:schema:registry@1.0.0` → `1.0.0`. */
function versionOf(document: unknown): string {
  if (typeof document !== "object" || document === null || !("$id" in document)) return FALLBACK_VERSION;
  const id = document.$id;
  const m = typeof id === "string" ? /@(\d+\.\d+\.\d+)$/.exec(id) : null;
  return m ? m[1] : FALLBACK_VERSION;
}

/**
 * The `*.schema.json` documents of one directory, keyed by file stem.
 * Validators compile on first use.
 */
export class SchemaRegistry {
  private readonly compiler: SchemaCompiler = createCompiler();

  private constructor(private readonly schemas: Map<string, LoadedSchema>) {}

  static fromDirectory(dir: string): SchemaRegistry {
    if (!fs.existsSync(dir)) throw new Error(`Schema directory not found: ${dir}`);

    const schemas = new Map<string, LoadedSchema>();
    for (const file of fs.readdirSync(dir).sort()) {
      if (!file.endsWith(SCHEMA_SUFFIX)) continue;
      const document: unknown = JSON.parse(fs.readFileSync(path.join(dir, file), "utf8"));
      schemas.set(file.slice(0, -SCHEMA_SUFFIX.length), { version: versionOf(document), document, check: null });
    }
    return new SchemaRegistry(schemas);
  }

  names(): string[] {
    return [...this.schemas.keys()];
  }

  versions(): Record<string, string> {
    return Object.fromEntries([...this.schemas].map(([name, s]) => [name, s.version]));
  }

  private checkFor(name: string): CompiledSchema {
    const schema = this.schemas.get(name);
    if (!schema) throw new Error(`Schema not found: ${name}`);
    schema.check ??= this.compiler.compile(schema.document);
    return schema.check;
  }

  /** `label` names the value in error text, e.g. `policy/enforcement must be object`. */
  validate(name: string, data: unknown, label = "data"): SchemaValidation {
    const check = this.checkFor(name);
    if (check(data)) return { valid: true, errors: null };
    return { valid: false, errors: describeFailure(this.compiler, check, label) };
  }
}

let bundled: SchemaRegistry | null = null;

/** Registry over `schemaDir`, or over the schemas shipped with the package. */
export function createSchemaRegistry(schemaDir: string = BUNDLED_SCHEMAS): SchemaRegistry {
  return SchemaRegistry.fromDirectory(schemaDir);
}

/** Process-wide registry over the shipped schemas. */
export function defaultSchemas(): SchemaRegistry {
  bundled ??= createSchemaRegistry();
  return bundled;
}
