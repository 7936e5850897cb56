import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

/** Compiled check; `errors` holds Ajv's error list after a failed call. */
export type CompiledSchema = ((data: unknown) => boolean) & { errors?: unknown };

/** The part of Ajv this package uses. */
export type SchemaCompiler = {
  compile: (schema: unknown) => CompiledSchema;
  errorsText: (errors: unknown, options?: { dataVar?: string; separator?: string }) => string;
};

const COMPILER_OPTIONS = { allErrors: true, strict: true, allowUnionTypes: true };

/**
 * Draft 2020-12 compiler with string formats. Ajv rejects a second schema with
 * an $id it has already seen, so each schema set gets its own compiler.
 */
export function createCompiler(): SchemaCompiler {
  const Compiler = Ajv2020 as unknown as new (opts: typeof COMPILER_OPTIONS) => SchemaCompiler;
  const withFormats = addFormats as unknown as (ajv: SchemaCompiler) => SchemaCompiler;
  return withFormats(new Compiler(COMPILER_OPTIONS));
}

/** One-line summary of a failed check, naming the checked value `label`. */
export function describeFailure(compiler: SchemaCompiler, check: CompiledSchema, label: string): string {
  return compiler.errorsText(check.errors, { dataVar: label, separator: "; " });
}
