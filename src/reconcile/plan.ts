import { AnnotationCorruption, ReopenConflict } from "../errors.js";
import { reopen } from "../lifecycle/transitions.js";
import { finalizedProjection } from "../metadata/model.js";
import type { ArtifactRecord } from "../types/artifact.js";
import type { MetadataPayload, TagMetadata } from "../types/metadata.js";
import type { ArchiveRecord, Registry, RegistryEntry } from "../types/registry.js";

export type ReconcileAction =
  /** Finalized artifact drifted: restore its full record inline, then drop the entry. */
  | { kind: "reopen"; record: ArtifactRecord; entry: RegistryEntry; metadata: TagMetadata; archive: ArchiveRecord }
  /** Entry was written but the inline block was never collapsed. */
  | { kind: "finish_finalize"; record: ArtifactRecord; entry: RegistryEntry; projection: MetadataPayload }
  /** Inline block was restored (reopen or refresh) but the entry was never removed. */
  | { kind: "finish_reopen"; record: ArtifactRecord; entry: RegistryEntry; archive: ArchiveRecord };

export type ReconcilePlan = {
  actions: ReconcileAction[];
  orphaned: ReopenConflict[];
  corrupt: AnnotationCorruption[];
};

/**
 * True when `inline` carries every event of the finalized record and more: the
 * record was restored and moved on, as a refresh certification does.
 */
function extendsHistory(inline: TagMetadata, finalized: TagMetadata): boolean {
  return (
    inline.history.length > finalized.history.length && finalized.history.every((event, i) => inline.history[i] === event)
  );
}

/**
 * Compare scanned records to the registry. Pure; applying the plan is the
 * caller's job. `unreadable` holds identities the scan saw but could not
 * decode, which are neither reconciled nor reported as orphans.
 */
export function planReconciliation(
  records: readonly ArtifactRecord[],
  registry: Registry,
  now: string,
  unreadable: ReadonlySet<string> = new Set(),
): ReconcilePlan {
  const plan: ReconcilePlan = { actions: [], orphaned: [], corrupt: [] };
  const live = new Set<string>();

  for (const record of records) {
    const { artifact, metadata } = record;
    live.add(artifact.id);
    const entry = registry.entries.get(artifact.id);

    if (metadata?.done && !entry) {
      plan.corrupt.push(new AnnotationCorruption(artifact.id, "marked done but the registry has no entry for it"));
      continue;
    }
    if (!entry) continue;

    // An annotation deleted by hand is treated like a finalized one: the registry still holds the record.
    if (metadata === null || metadata.done) {
      if (entry.digest === artifact.digest) {
        if (metadata === null) {
          plan.actions.push({ kind: "finish_finalize", record, entry, projection: finalizedProjection(entry.metadata) });
        }
        continue;
      }

      const reopened = reopen(entry, { liveDigest: artifact.digest, now });
      if (reopened.ok) {
        plan.actions.push({ kind: "reopen", record, entry, metadata: reopened.metadata, archive: reopened.archive });
      }
      continue;
    }

    if (entry.digest === artifact.digest && !extendsHistory(metadata, entry.metadata)) {
      plan.actions.push({ kind: "finish_finalize", record, entry, projection: finalizedProjection(entry.metadata) });
    } else {
      plan.actions.push({
        kind: "finish_reopen",
        record,
        entry,
        archive: {
          id: entry.id,
          archived_at: now,
          reason: entry.digest === artifact.digest ? "recertified" : "interrupted_reopen",
          old_digest: entry.digest,
          new_digest: artifact.digest,
        },
      });
    }
  }

  for (const entry of registry.entries.values()) {
    if (!live.has(entry.id) && !unreadable.has(entry.id)) {
      plan.orphaned.push(new ReopenConflict(entry.id, entry.digest));
    }
  }
  return plan;
}
