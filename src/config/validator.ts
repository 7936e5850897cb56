import { ConfigError } from "../errors.js";
import { defaultSchemas } from "../schema/registry.js";
import type { ProvenantConfig } from "../types/config.js";
import { loadConfig, type LoadConfigOptions } from "./loader.js";

export type ConfigValidationResult = { valid: true; config: ProvenantConfig } | { valid: false; errors: string };

function isProvenantConfig(value: unknown): value is ProvenantConfig {
  return defaultSchemas().validate("config", value, "config").valid;
}

/** Validate a loaded config against schemas/config.schema.json. */
export function validateConfig(config: unknown): ConfigValidationResult {
  if (isProvenantConfig(config)) return { valid: true, config };
  const { errors } = defaultSchemas().validate("config", config, "config");
  return { valid: false, errors: errors ?? "invalid config" };
}

/** Load and validate in one step; throws ConfigError when the merged result is invalid. */
export function resolveConfig(opts: LoadConfigOptions = {}): ProvenantConfig {
  const result = validateConfig(loadConfig(opts));
  if (!result.valid) throw new ConfigError(opts.configDir ?? "config", result.errors);
  return result.config;
}
