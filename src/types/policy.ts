import type { Scrutiny } from "./metadata.js";

/** Policy configuration, owned by the repository and consumed read-only. */
export type AgentPermission = {
  id: string;
  max_scrutiny: Scrutiny;
  allow_finalize: boolean;
  notes: string | null;
};

export type AgentSettings = {
  enabled: boolean;
  allowed_ids: string[];
  allow_coverage_credit: boolean;
  default_scrutiny: Scrutiny;
  reviewers: AgentPermission[];
};

export type ReopenedArtifactsMode = "uncertified" | "retain";

export type OrphanedEntriesMode = "warn" | "error";

export type EnforcementSettings = {
  ai_composed_requires_high_scrutiny: boolean;
  min_coverage: number | null;
  ignore_unannotated: boolean;
  reopened_artifacts: ReopenedArtifactsMode;
  orphaned_entries: OrphanedEntriesMode;
};

export type PolicyConfig = {
  enforcement: EnforcementSettings;
  reviewers: string[];
  integrations: {
    agents: AgentSettings;
  };
};
