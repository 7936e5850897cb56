/** Policy evaluation output. Violations are data, never exceptions. */
export type ViolationKind =
  | "ai_composed_requires_high_scrutiny"
  | "min_coverage"
  | "orphaned_registry_entry";

export type PolicyViolation = {
  kind: ViolationKind;
  artifactId: string | null;
  message: string;
};

export type PolicyReport = {
  status: "pass" | "fail";
  coverage_ratio: number;
  agent_ratio: number;
  eligible: number;
  certified: number;
  violations: PolicyViolation[];
  /** Identities of eligible artifacts that are not certified. */
  pending: string[];
  counts: {
    finalized: number;
    ai_pending: number;
    agent_only: number;
  };
};
