import { scrutinyWithin } from "../metadata/model.js";
import type { ReviewerInfo } from "../types/metadata.js";
import type { AgentPermission, AgentSettings, PolicyConfig } from "../types/policy.js";

export type PermissionLookup = { ok: true; permission: AgentPermission } | { ok: false; reason: string };

/**
 * Resolve what an agent may do. An explicit `reviewers` entry wins; an id that
 * is only in `allowed_ids` gets the default scrutiny and no finalize right.
 * When `allowed_ids` is non-empty it gates every agent, listed or not.
 */
export function resolveAgentPermission(agents: AgentSettings, agentId: string): PermissionLookup {
  if (!agents.enabled) {
    return { ok: false, reason: "agent integrations are disabled by policy" };
  }
  const explicit = agents.reviewers.find((r) => r.id === agentId);
  if (agents.allowed_ids.length > 0 && !agents.allowed_ids.includes(agentId)) {
    return { ok: false, reason: `agent ${agentId} is not in allowed_ids` };
  }
  if (explicit) return { ok: true, permission: explicit };
  if (agents.allowed_ids.includes(agentId)) {
    return {
      ok: true,
      permission: { id: agentId, max_scrutiny: agents.default_scrutiny, allow_finalize: false, notes: null },
    };
  }
  return { ok: false, reason: `agent ${agentId} has no permission entry` };
}

/** Agent review that stays inside the agent's bounds. Optionally restricted to reviews after `since`. */
export function isQualifyingAgentReview(agents: AgentSettings, reviewer: ReviewerInfo, since: string | null = null): boolean {
  if (reviewer.kind !== "agent") return false;
  if (since !== null && reviewer.timestamp <= since) return false;
  const lookup = resolveAgentPermission(agents, reviewer.id);
  return lookup.ok && scrutinyWithin(reviewer.scrutiny, lookup.permission.max_scrutiny);
}

/** Human review by an allow-listed reviewer, or by anyone when the list is empty. */
export function isQualifyingHumanReview(policy: PolicyConfig, reviewer: ReviewerInfo): boolean {
  if (reviewer.kind !== "human") return false;
  return policy.reviewers.length === 0 || policy.reviewers.includes(reviewer.id);
}

