/** Provenance metadata attached to a single artifact. */
export const SCRUTINY_LEVELS = ["auto", "low", "medium", "high"] as const;

export type Scrutiny = (typeof SCRUTINY_LEVELS)[number];

export type ReviewerKind = "human" | "agent";

export type ReviewerInfo = {
  kind: ReviewerKind;
  id: string;
  scrutiny: Scrutiny;
  timestamp: string;
  notes: string | null;
};

export type TagMetadata = {
  ai_composed: string;
  human_certified: string;
  scrutiny: Scrutiny;
  date: string | null;
  notes: string | null;
  /** Append-only event log, oldest first. */
  history: string[];
  /** Chronological approval order. */
  reviewers: ReviewerInfo[];
  /** True only while the artifact is finalized and its full record lives in the registry. */
  done: boolean;
  /** Set when reconciliation reopened the artifact; cleared by the next human certification. */
  reopened_at: string | null;
  /** Unrecognized keys, re-emitted unchanged on every rewrite. */
  extras: Record<string, unknown>;
};

/** Plain key/value form of TagMetadata as written inline or into the registry. */
export type MetadataPayload = Record<string, unknown>;
