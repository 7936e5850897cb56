import type { TagMetadata } from "./metadata.js";

/** Finalized record held out-of-band. Created by Finalize, removed by Reopen. */
export type RegistryEntry = {
  id: string;
  digest: string;
  finalized_at: string;
  metadata: TagMetadata;
};

export type ArchiveReason = "digest_mismatch" | "interrupted_reopen" | "recertified";

export type ArchiveRecord = {
  id: string;
  archived_at: string;
  reason: ArchiveReason;
  old_digest: string;
  new_digest: string;
};

export type Registry = {
  entries: Map<string, RegistryEntry>;
  archive: ArchiveRecord[];
};
