import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigError, errorMessage } from "../errors.js";
import { getLogger } from "../logging/logger.js";
import { parseScrutiny } from "../metadata/model.js";
import { defaultSchemas } from "../schema/registry.js";
import type { AgentPermission, PolicyConfig } from "../types/policy.js";

const log = getLogger("policy");

export const POLICY_FILE_CANDIDATES = [".provenant.yml", "provenant.yml"];

export function defaultPolicy(): PolicyConfig {
  return {
    enforcement: {
      ai_composed_requires_high_scrutiny: true,
      min_coverage: null,
      ignore_unannotated: false,
      reopened_artifacts: "uncertified",
      orphaned_entries: "warn",
    },
    reviewers: [],
    integrations: {
      agents: {
        enabled: false,
        allowed_ids: [],
        allow_coverage_credit: false,
        default_scrutiny: "low",
        reviewers: [],
      },
    },
  };
}

type RawPolicy = {
  enforcement?: Partial<PolicyConfig["enforcement"]>;
  reviewers?: string[];
  integrations?: {
    agents?: {
      enabled?: boolean;
      allowed_ids?: string[];
      allow_coverage_credit?: boolean;
      default_scrutiny?: string;
      reviewers?: Array<{ id: string; max_scrutiny?: string; allow_finalize?: boolean; notes?: string | null }>;
    };
  };
};

/**
 * Validate a parsed policy document and fill in defaults. `source` names the
 * document in errors.
 */
export function normalizePolicy(doc: unknown, source: string): PolicyConfig {
  const base = defaultPolicy();
  if (doc === null || doc === undefined) return base;

  const check = defaultSchemas().validate("policy", doc, "policy");
  if (!check.valid) throw new ConfigError(source, check.errors ?? "invalid policy");

  const raw = doc as RawPolicy;
  const agents = raw.integrations?.agents ?? {};
  const defaultScrutiny = parseScrutiny(agents.default_scrutiny) ?? base.integrations.agents.default_scrutiny;

  const reviewers: AgentPermission[] = (agents.reviewers ?? []).map((r) => ({
    id: r.id,
    max_scrutiny: parseScrutiny(r.max_scrutiny) ?? defaultScrutiny,
    allow_finalize: r.allow_finalize ?? false,
    notes: r.notes ?? null,
  }));

  return {
    enforcement: { ...base.enforcement, ...raw.enforcement },
    reviewers: raw.reviewers ?? [],
    integrations: {
      agents: {
        enabled: agents.enabled ?? base.integrations.agents.enabled,
        allowed_ids: agents.allowed_ids ?? [],
        allow_coverage_credit: agents.allow_coverage_credit ?? base.integrations.agents.allow_coverage_credit,
        default_scrutiny: defaultScrutiny,
        reviewers,
      },
    },
  };
}

/** Path of the policy file in `root`, or null when there is none. `file` is tried before the usual names. */
export function findPolicyFile(root: string, file?: string): string | null {
  const candidates = file ? [file, ...POLICY_FILE_CANDIDATES] : POLICY_FILE_CANDIDATES;
  for (const candidate of candidates) {
    const p = path.resolve(root, candidate);
    if (fs.existsSync(p)) return p;
  }
  return null;
}

/** Read the repository policy. A missing file yields the defaults. */
export function loadPolicy(root: string, file?: string): PolicyConfig {
  const p = findPolicyFile(root, file);
  if (!p) {
    log.debug({ root }, "no policy file, using defaults");
    return defaultPolicy();
  }

  let doc: unknown;
  try {
    doc = YAML.parse(fs.readFileSync(p, "utf8"));
  } catch (e) {
    throw new ConfigError(p, `invalid YAML: ${errorMessage(e)}`);
  }
  return normalizePolicy(doc, p);
}
