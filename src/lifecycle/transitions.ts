import { shortDigest } from "../digest/checksum.js";
import { AgentPermissionError, LifecycleError } from "../errors.js";
import {
  cloneMetadata,
  emptyMetadata,
  finalizedProjection,
  isAiComposed,
  isPendingCertification,
  scrutinyWithin,
} from "../metadata/model.js";
import type { MetadataPayload, ReviewerInfo, Scrutiny, TagMetadata } from "../types/metadata.js";
import type { AgentSettings, PolicyConfig } from "../types/policy.js";
import type { ArchiveRecord, RegistryEntry } from "../types/registry.js";
import { appendHistory, historyEvent } from "./history.js";
import { isQualifyingAgentReview, isQualifyingHumanReview, resolveAgentPermission } from "./permissions.js";
import { canTransition, stageOf } from "./state-machine.js";

export type TransitionError = LifecycleError | AgentPermissionError;

export type TransitionResult = { ok: true; metadata: TagMetadata } | { ok: false; error: TransitionError };

export type FinalizeResult =
  | { ok: true; metadata: TagMetadata; projection: MetadataPayload; entry: RegistryEntry }
  | { ok: false; error: TransitionError };

export type ReopenResult = { ok: true; metadata: TagMetadata; archive: ArchiveRecord } | { ok: false; error: LifecycleError };

export type AnnotateInput = {
  artifactId: string;
  aiComposed: string;
  notes: string | null;
  /** Source-control attribution for the history line, e.g. `last_commit=abc1234 by dev`. */
  attribution: string | null;
  now: string;
};

/** Pristine → annotated. */
export function annotate(current: TagMetadata | null, input: AnnotateInput): TransitionResult {
  if (!canTransition(stageOf(current), "annotate")) {
    return { ok: false, error: new LifecycleError(input.artifactId, "already annotated") };
  }
  const metadata: TagMetadata = {
    ...emptyMetadata(),
    ai_composed: input.aiComposed,
    notes: input.notes,
    date: input.now,
    history: [historyEvent(input.now, "annotated", input.attribution)],
  };
  return { ok: true, metadata };
}

export type CertifyInput = {
  artifactId: string;
  reviewer: string;
  scrutiny: Scrutiny;
  notes: string | null;
  /** Refresh an artifact that already carries a human certification. A reopened one needs no refresh. */
  includeExisting: boolean;
  now: string;
};

/** Annotated/under review → under review. A finalized record is refreshed through `recertify`. */
export function certifyHuman(m: TagMetadata, input: CertifyInput, policy: PolicyConfig): TransitionResult {
  const { artifactId } = input;
  if (m.done) {
    return {
      ok: false,
      error: new LifecycleError(artifactId, "artifact is finalized; re-certify it from its registry record with includeExisting"),
    };
  }
  if (!isPendingCertification(m) && m.reopened_at === null && !input.includeExisting) {
    return { ok: false, error: new LifecycleError(artifactId, `already certified by ${m.human_certified}`) };
  }
  const reviewer: ReviewerInfo = {
    kind: "human",
    id: input.reviewer,
    scrutiny: input.scrutiny,
    timestamp: input.now,
    notes: input.notes,
  };
  if (!isQualifyingHumanReview(policy, reviewer)) {
    return { ok: false, error: new LifecycleError(artifactId, `reviewer ${input.reviewer} is not in the policy reviewer list`) };
  }

  const next = cloneMetadata(m);
  next.human_certified = input.reviewer;
  next.scrutiny = input.scrutiny;
  next.notes = input.notes;
  next.date = input.now;
  next.reviewers.push(reviewer);
  next.reopened_at = null;
  next.history = appendHistory(
    m.history,
    historyEvent(input.now, "certified", `reviewer=${input.reviewer} scrutiny=${input.scrutiny}`),
  );
  return { ok: true, metadata: next };
}

export type CertifyAgentInput = {
  artifactId: string;
  agentId: string;
  /** Defaults to the agent's max_scrutiny. */
  scrutiny: Scrutiny | null;
  notes: string | null;
  aiComposed: string | null;
  now: string;
};

/** Fails closed: any permission problem returns an error and leaves `m` untouched. */
export function certifyAgent(m: TagMetadata, input: CertifyAgentInput, agents: AgentSettings): TransitionResult {
  const { artifactId, agentId } = input;
  if (m.done) {
    return { ok: false, error: new LifecycleError(artifactId, "artifact is finalized; it must be reopened before agent review") };
  }
  const lookup = resolveAgentPermission(agents, agentId);
  if (!lookup.ok) return { ok: false, error: new AgentPermissionError(agentId, lookup.reason) };

  const scrutiny = input.scrutiny ?? lookup.permission.max_scrutiny;
  if (!scrutinyWithin(scrutiny, lookup.permission.max_scrutiny)) {
    return {
      ok: false,
      error: new AgentPermissionError(
        agentId,
        `agent ${agentId} may certify up to ${lookup.permission.max_scrutiny}, requested ${scrutiny}`,
      ),
    };
  }

  const next = cloneMetadata(m);
  next.reviewers.push({ kind: "agent", id: agentId, scrutiny, timestamp: input.now, notes: input.notes });
  if (input.aiComposed !== null) next.ai_composed = input.aiComposed;
  if (input.notes !== null) next.notes = input.notes;
  next.history = appendHistory(m.history, historyEvent(input.now, "agent_certified", `agent=${agentId} scrutiny=${scrutiny}`));
  return { ok: true, metadata: next };
}

export type FinalizeInput = {
  artifactId: string;
  digest: string;
  now: string;
};

/** Reviews that count toward finalize. After a reopen only newer reviews count unless the policy retains them. */
function qualifyingReviews(m: TagMetadata, policy: PolicyConfig): ReviewerInfo[] {
  const since = policy.enforcement.reopened_artifacts === "uncertified" ? m.reopened_at : null;
  const needsHigh = policy.enforcement.ai_composed_requires_high_scrutiny && isAiComposed(m);
  return m.reviewers.filter((r) => {
    if (since !== null && r.timestamp <= since) return false;
    if (needsHigh && r.scrutiny !== "high") return false;
    return r.kind === "human" ? isQualifyingHumanReview(policy, r) : isQualifyingAgentReview(policy.integrations.agents, r);
  });
}

/**
 * Under review → finalized. Produces the full record for the registry and the
 * minimal projection that stays inline.
 */
export function finalize(m: TagMetadata, input: FinalizeInput, policy: PolicyConfig): FinalizeResult {
  const { artifactId } = input;
  if (m.done) return { ok: false, error: new LifecycleError(artifactId, "already finalized") };

  if (qualifyingReviews(m, policy).length === 0) {
    const needsHigh = policy.enforcement.ai_composed_requires_high_scrutiny && isAiComposed(m);
    return {
      ok: false,
      error: new LifecycleError(artifactId, needsHigh ? "no qualifying high-scrutiny reviewer" : "no qualifying reviewer"),
    };
  }

  const latest = m.reviewers[m.reviewers.length - 1];
  if (latest.kind === "agent") {
    const lookup = resolveAgentPermission(policy.integrations.agents, latest.id);
    if (!lookup.ok) return { ok: false, error: new AgentPermissionError(latest.id, lookup.reason) };
    if (!lookup.permission.allow_finalize) {
      return { ok: false, error: new AgentPermissionError(latest.id, `agent ${latest.id} is not allowed to finalize`) };
    }
  }

  const metadata = cloneMetadata(m);
  metadata.done = true;
  metadata.history = appendHistory(m.history, historyEvent(input.now, "finalized", `digest=${shortDigest(input.digest)}`));

  return {
    ok: true,
    metadata,
    projection: finalizedProjection(metadata),
    entry: { id: artifactId, digest: input.digest, finalized_at: input.now, metadata: cloneMetadata(metadata) },
  };
}

export type RecertifyInput = CertifyInput & {
  /** Digest of the code as it is now. */
  liveDigest: string;
};

export type RecertifyResult = ReopenResult;

/**
 * Finalized → under review by an explicit human refresh. The registry's full
 * record comes back inline with the new review on top, and the entry is
 * archived. Needs `includeExisting`.
 */
export function recertify(entry: RegistryEntry, input: RecertifyInput, policy: PolicyConfig): RecertifyResult {
  if (!input.includeExisting) {
    return { ok: false, error: new LifecycleError(entry.id, "artifact is finalized; pass includeExisting to re-certify it") };
  }
  const restored = cloneMetadata(entry.metadata);
  restored.done = false;
  const res = certifyHuman(restored, input, policy);
  if (!res.ok) {
    return { ok: false, error: res.error instanceof LifecycleError ? res.error : new LifecycleError(entry.id, res.error.message) };
  }
  return {
    ok: true,
    metadata: res.metadata,
    archive: {
      id: entry.id,
      archived_at: input.now,
      reason: "recertified",
      old_digest: entry.digest,
      new_digest: input.liveDigest,
    },
  };
}

export type ReopenInput = {
  liveDigest: string;
  now: string;
};

/** Finalized → annotated/under_review, restoring the registry's full record. */
export function reopen(entry: RegistryEntry, input: ReopenInput): ReopenResult {
  if (entry.digest === input.liveDigest) {
    return { ok: false, error: new LifecycleError(entry.id, "digest unchanged; nothing to reopen") };
  }
  const metadata = cloneMetadata(entry.metadata);
  metadata.done = false;
  metadata.reopened_at = input.now;
  metadata.history = appendHistory(
    entry.metadata.history,
    historyEvent(
      input.now,
      "reopened",
      `digest mismatch previous=${shortDigest(entry.digest)} current=${shortDigest(input.liveDigest)}`,
    ),
  );
  return {
    ok: true,
    metadata,
    archive: {
      id: entry.id,
      archived_at: input.now,
      reason: "digest_mismatch",
      old_digest: entry.digest,
      new_digest: input.liveDigest,
    },
  };
}
