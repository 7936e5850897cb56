import type { AnnotationCodec } from "../annotation/codec.js";
import { writeAnnotations, type AnnotationUpdate } from "../annotation/writer.js";
import type { AnnotationCorruption, ReopenConflict } from "../errors.js";
import { getLogger } from "../logging/logger.js";
import { metadataToPayload } from "../metadata/model.js";
import { withoutEntry, type RegistryStore } from "../registry/store.js";
import type { ScanResult } from "../types/artifact.js";
import type { TagMetadata } from "../types/metadata.js";
import { planReconciliation } from "./plan.js";

const log = getLogger("reconcile");

export type ReopenedArtifact = {
  id: string;
  file: string;
  previousDigest: string;
  currentDigest: string;
  /** Full record now inline again. */
  metadata: TagMetadata;
};

export type ReconcileResult = {
  reopened: ReopenedArtifact[];
  orphaned: ReopenConflict[];
  /** Identities whose interrupted finalize or reopen was completed. */
  recovered: string[];
  corrupt: AnnotationCorruption[];
};

export type ReconcileDeps = {
  root: string;
  store: RegistryStore;
  codec: AnnotationCodec;
  scan: () => Promise<ScanResult>;
  now: () => string;
};

/**
 * Bring inline annotations and the registry back into agreement. Runs under
 * one registry lock; inline rewrites land before the registry commit so an
 * interruption between them is picked up by the next run.
 */
export async function reconcile(deps: ReconcileDeps): Promise<ReconcileResult> {
  return deps.store.transaction(async (tx) => {
    const scanned = await deps.scan();
    const unreadable = new Set(scanned.errors.flatMap((e) => (e.artifactId ? [e.artifactId] : [])));
    const plan = planReconciliation(scanned.records, tx.registry, deps.now(), unreadable);

    const updates: AnnotationUpdate[] = [];
    let registry = tx.registry;
    const result: ReconcileResult = { reopened: [], orphaned: plan.orphaned, recovered: [], corrupt: plan.corrupt };

    for (const action of plan.actions) {
      const id = action.record.artifact.id;
      switch (action.kind) {
        case "reopen":
          updates.push({ artifact: action.record.artifact, payload: metadataToPayload(action.metadata) });
          registry = withoutEntry(registry, action.archive);
          result.reopened.push({
            id,
            file: action.record.artifact.file,
            previousDigest: action.entry.digest,
            currentDigest: action.record.artifact.digest,
            metadata: action.metadata,
          });
          break;
        case "finish_finalize":
          updates.push({ artifact: action.record.artifact, payload: action.projection });
          result.recovered.push(id);
          break;
        case "finish_reopen":
          registry = withoutEntry(registry, action.archive);
          result.recovered.push(id);
          break;
      }
    }

    if (updates.length > 0) await writeAnnotations(deps.root, updates, deps.codec);
    if (registry !== tx.registry) await tx.commit(registry);

    for (const r of result.reopened) {
      log.info({ artifact: r.id, previous: r.previousDigest, current: r.currentDigest }, "reopened after digest drift");
    }
    for (const id of result.recovered) log.warn({ artifact: id }, "completed interrupted transition");
    for (const o of result.orphaned) log.warn({ artifact: o.artifactId }, "registry entry has no matching artifact");
    for (const c of result.corrupt) log.error({ artifact: c.artifactId, reason: c.reason }, "annotation and registry disagree");

    return result;
  });
}
