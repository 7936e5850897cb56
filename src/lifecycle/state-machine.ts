import { hasMetadata, isPendingCertification } from "../metadata/model.js";
import type { TagMetadata } from "../types/metadata.js";

/**
 * Certification stages in order. Reopen is a transition, not a stage: it takes
 * a finalized artifact back to annotated or under_review with its record intact.
 */
export const STAGES = ["pristine", "annotated", "under_review", "finalized"] as const;

export type Stage = (typeof STAGES)[number];

export type Transition = "annotate" | "certify" | "certify_agent" | "finalize" | "reopen";

/** Stage of an artifact from its inline metadata (null while no annotation exists). */
export function stageOf(m: TagMetadata | null): Stage {
  if (m === null || !hasMetadata(m)) return "pristine";
  if (m.done) return "finalized";
  if (m.reviewers.length > 0 || !isPendingCertification(m)) return "under_review";
  return "annotated";
}

const ALLOWED: Record<Transition, readonly Stage[]> = {
  annotate: ["pristine"],
  certify: ["annotated", "under_review"],
  certify_agent: ["annotated", "under_review"],
  finalize: ["under_review"],
  reopen: ["finalized"],
};

/** Whether `transition` may start from `stage`. Finer preconditions live in the transition itself. */
export function canTransition(stage: Stage, transition: Transition): boolean {
  return ALLOWED[transition].includes(stage);
}
