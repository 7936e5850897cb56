import { isQualifyingAgentReview, isQualifyingHumanReview } from "../lifecycle/permissions.js";
import { stageOf } from "../lifecycle/state-machine.js";
import { isAiComposed, isPendingCertification } from "../metadata/model.js";
import type { ArtifactRecord } from "../types/artifact.js";
import type { TagMetadata } from "../types/metadata.js";
import type { PolicyConfig } from "../types/policy.js";
import type { PolicyReport, PolicyViolation } from "../types/report.js";

export type EvaluateOptions = {
  /** Registry identities with no artifact in the current scan. */
  orphans?: readonly string[];
};

type Certification = "human" | "agent" | null;

/** Reviews recorded before a reopen are stale unless the policy retains them. */
function staleBefore(m: TagMetadata, policy: PolicyConfig): string | null {
  return policy.enforcement.reopened_artifacts === "uncertified" ? m.reopened_at : null;
}

function certification(m: TagMetadata | null, policy: PolicyConfig): Certification {
  if (m === null) return null;
  const since = staleBefore(m, policy);
  if (!isPendingCertification(m) && since === null) return "human";

  const agents = policy.integrations.agents;
  if (agents.allow_coverage_credit && m.reviewers.some((r) => isQualifyingAgentReview(agents, r, since))) {
    return "agent";
  }
  return null;
}

/**
 * High scrutiny still in force. After a reopen that voids earlier reviews, the
 * recorded level no longer counts; only a high review made since does.
 */
function hasHighScrutiny(m: TagMetadata, policy: PolicyConfig): boolean {
  const since = staleBefore(m, policy);
  if (since === null && m.scrutiny === "high") return true;
  return m.reviewers.some((r) => {
    if (r.scrutiny !== "high") return false;
    if (r.kind === "agent") return isQualifyingAgentReview(policy.integrations.agents, r, since);
    return since !== null && r.timestamp > since && isQualifyingHumanReview(policy, r);
  });
}

function highScrutinyMessage(id: string, m: TagMetadata, policy: PolicyConfig): string {
  const since = staleBefore(m, policy);
  if (since !== null) {
    return `${id} was composed by ${m.ai_composed} and has no high-scrutiny review since it was reopened at ${since}`;
  }
  return `${id} was composed by ${m.ai_composed} and has scrutiny ${m.scrutiny}; high is required`;
}

/**
 * Coverage and enforcement verdict for a set of records. Pure: no I/O and no
 * mutation of its inputs.
 */
export function evaluatePolicy(
  records: readonly ArtifactRecord[],
  policy: PolicyConfig,
  opts: EvaluateOptions = {},
): PolicyReport {
  const { enforcement } = policy;
  const eligible = records.filter((r) => !(enforcement.ignore_unannotated && stageOf(r.metadata) === "pristine"));

  const violations: PolicyViolation[] = [];
  const pending: string[] = [];
  let certified = 0;
  let agentOnly = 0;

  for (const record of eligible) {
    const how = certification(record.metadata, policy);
    if (how === null) {
      pending.push(record.artifact.id);
      continue;
    }
    certified++;
    if (how === "agent") agentOnly++;
  }

  let finalized = 0;
  let aiPending = 0;
  for (const { artifact, metadata: m } of records) {
    if (m === null) continue;
    if (m.done) finalized++;
    if (isAiComposed(m) && isPendingCertification(m)) aiPending++;

    if (enforcement.ai_composed_requires_high_scrutiny && isAiComposed(m) && !hasHighScrutiny(m, policy)) {
      violations.push({
        kind: "ai_composed_requires_high_scrutiny",
        artifactId: artifact.id,
        message: highScrutinyMessage(artifact.id, m, policy),
      });
    }
  }

  const total = eligible.length;
  const coverage = total === 0 ? 1 : certified / total;

  if (enforcement.min_coverage !== null && coverage < enforcement.min_coverage) {
    violations.push({
      kind: "min_coverage",
      artifactId: null,
      message: `coverage ${formatRatio(coverage)} is below the required ${formatRatio(enforcement.min_coverage)}`,
    });
  }

  if (enforcement.orphaned_entries === "error") {
    for (const id of opts.orphans ?? []) {
      violations.push({
        kind: "orphaned_registry_entry",
        artifactId: id,
        message: `registry entry ${id} has no matching artifact`,
      });
    }
  }

  return {
    status: violations.length === 0 ? "pass" : "fail",
    coverage_ratio: coverage,
    agent_ratio: total === 0 ? 0 : agentOnly / total,
    eligible: total,
    certified,
    violations,
    pending,
    counts: { finalized, ai_pending: aiPending, agent_only: agentOnly },
  };
}

export function formatRatio(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}
