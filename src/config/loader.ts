import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { ConfigError, errorMessage } from "../errors.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "PROVENANT_";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const existing = result[key];
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return the parsed mapping, or an empty one if the file does not exist. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new ConfigError(filePath, `invalid YAML: ${errorMessage(e)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) throw new ConfigError(filePath, "expected a mapping");
  return parsed;
}

/** Coerce an environment string to the type the key already has. */
function coerce(raw: string, current: unknown): unknown {
  if (typeof current === "number") {
    const n = Number(raw);
    return Number.isFinite(n) ? n : raw;
  }
  if (typeof current === "boolean") return raw === "true" || raw === "1";
  if (Array.isArray(current)) {
    return raw
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  }
  return raw;
}

/** Apply PROVENANT_ prefixed environment variable overrides. */
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // PROVENANT_LOCK_TIMEOUT_MS → lock_timeout_ms
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    result[configKey] = coerce(value, result[configKey]);
  }
  return result;
}

export type LoadConfigOptions = {
  /** Loads `config/<envName>.yaml` as an override layer. */
  envName?: string;
  configDir?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Load layered config: base.yaml ← <env>.yaml ← environment variables.
 * The result is not validated; see validateConfig.
 */
export function loadConfig(opts: LoadConfigOptions = {}): Record<string, unknown> {
  const dir = opts.configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (opts.envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${opts.envName}.yaml`)));
  }
  return applyEnvOverrides(merged, opts.env ?? process.env);
}
