import fs from "node:fs";
import path from "node:path";
import { resolveConfig } from "../config/validator.js";
import { ProvenanceEngine } from "../core/engine.js";
import { ConfigError, ProvenanceError, RegistryCorruption, errorMessage, type ErrorCode } from "../errors.js";
import { GitAttribution, type AttributionSource } from "../git/attribution.js";
import { getLogger, setLogLevel } from "../logging/logger.js";
import { loadPolicy } from "../policy/loader.js";
import { FileRegistryStore } from "../registry/file-store.js";
import type { ProvenantConfig } from "../types/config.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

const log = getLogger("cli");

export type OutputFormat = "human" | "jsonl";

export type CommonOpts = {
  /** Repository root; defaults to the working directory. */
  root?: string;
  configDir?: string;
  /** Name of a `config/<env>.yaml` override layer. */
  env?: string;
  /** Policy file relative to the root, overriding config.policy_file. */
  policy?: string;
  /** Injected by tests. */
  attribution?: AttributionSource;
  clock?: () => Date;
};

export type CommandFailure = {
  ok: false;
  error: { code: ErrorCode | "INVALID_ARGS" | "INTERNAL"; message: string };
  exitCode: ExitCode;
};

export type EngineContext = {
  root: string;
  config: ProvenantConfig;
  engine: ProvenanceEngine;
};

/** Resolve config and policy for `root` and wire an engine over them. */
export function createContext(opts: CommonOpts): EngineContext {
  const root = path.resolve(opts.root ?? process.cwd());
  const config = resolveConfig({ envName: opts.env, configDir: opts.configDir });
  setLogLevel(config.log_level);

  const store = new FileRegistryStore(root, {
    dir: config.registry_dir,
    file: config.registry_file,
    lockTimeoutMs: config.lock_timeout_ms,
    staleLockMs: config.stale_lock_ms,
  });
  if (opts.policy && !fs.existsSync(path.resolve(root, opts.policy))) {
    throw new ConfigError(opts.policy, "policy file not found");
  }
  const policy = loadPolicy(root, opts.policy ?? config.policy_file);

  const engine = new ProvenanceEngine({
    root,
    store,
    policy,
    attribution: opts.attribution ?? new GitAttribution(root),
    clock: opts.clock,
    include: config.include,
    exclude: [...config.exclude, `${config.registry_dir}/**`],
  });
  return { root, config, engine };
}

export function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof RegistryCorruption) return EXIT.REGISTRY_ERROR;
  if (err instanceof ConfigError) return EXIT.INVALID_ARGS;
  return EXIT.OPERATION_FAILED;
}

/** Turn a thrown value into the failure arm of a command result. */
export function toFailure(err: unknown): CommandFailure {
  if (!(err instanceof ProvenanceError)) log.error({ err }, "unexpected failure");
  return {
    ok: false,
    error: { code: err instanceof ProvenanceError ? err.code : "INTERNAL", message: errorMessage(err) },
    exitCode: exitCodeFor(err),
  };
}

export function invalidArgs(message: string): CommandFailure {
  return { ok: false, error: { code: "INVALID_ARGS", message }, exitCode: EXIT.INVALID_ARGS };
}
