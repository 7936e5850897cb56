import { defaultCodec, type AnnotationCodec } from "../annotation/codec.js";
import { writeAnnotations, type AnnotationUpdate } from "../annotation/writer.js";
import { AnnotationCorruption, ArtifactNotFound, LifecycleError, ProvenanceError } from "../errors.js";
import { StaticAttribution, UNKNOWN_ATTRIBUTION, type AttributionSource } from "../git/attribution.js";
import { stageOf } from "../lifecycle/state-machine.js";
import * as transitions from "../lifecycle/transitions.js";
import { getLogger } from "../logging/logger.js";
import { isPendingCertification, metadataToPayload } from "../metadata/model.js";
import { evaluatePolicy } from "../policy/evaluator.js";
import { reconcile, type ReconcileResult } from "../reconcile/reconciler.js";
import { withEntry, withoutEntry, type RegistryStore } from "../registry/store.js";
import { resolveScopes, scan, scanFile } from "../scanner/scanner.js";
import type { Artifact, ArtifactRecord, ScanIssue, ScanResult } from "../types/artifact.js";
import type { Scrutiny, TagMetadata } from "../types/metadata.js";
import type { PolicyConfig } from "../types/policy.js";
import type { ArchiveRecord, Registry, RegistryEntry } from "../types/registry.js";
import type { PolicyReport } from "../types/report.js";

const log = getLogger("engine");

/** An identity string (`path::Qualified.name`) or a scanned artifact. */
export type ArtifactRef = string | Artifact;

export type EngineOptions = {
  root: string;
  store: RegistryStore;
  policy: PolicyConfig;
  codec?: AnnotationCodec;
  attribution?: AttributionSource;
  clock?: () => Date;
  /** Source globs, from `include` and `exclude` in the tool config. */
  include: string[];
  exclude: string[];
};

export type SkippedArtifact = { id: string; reason: string };

export type FinalizeAllResult = {
  finalized: RegistryEntry[];
  skipped: SkippedArtifact[];
};

export type CertifyAllOptions = {
  notes?: string | null;
  /** Also refresh artifacts that already carry a human certification, finalized ones included. */
  includeExisting?: boolean;
  /** Files or directories to restrict to; empty means the whole repository. */
  paths?: readonly string[];
};

export type CertifyAllResult = {
  certified: string[];
  skipped: SkippedArtifact[];
};

export type PreCommitResult = {
  annotated: string[];
  /** Verdict over the artifacts under the hook's paths only. */
  report: PolicyReport;
  errors: ScanIssue[];
};

type CertifyStep =
  | { ok: true; metadata: TagMetadata; archive: ArchiveRecord | null }
  | { ok: false; error: ProvenanceError };

export type CheckResult = {
  report: PolicyReport;
  orphaned: string[];
  errors: ScanIssue[];
};

/** File part of an identity string. */
export function fileOfId(id: string): string {
  const sep = id.indexOf("::");
  if (sep <= 0) throw new ArtifactNotFound(id);
  return id.slice(0, sep);
}

/**
 * Lifecycle operations over one repository. Every source rewrite happens while
 * holding the registry lock, so concurrent runs serialize on it.
 */
export class ProvenanceEngine {
  readonly root: string;
  readonly policy: PolicyConfig;
  private readonly store: RegistryStore;
  private readonly codec: AnnotationCodec;
  private readonly attribution: AttributionSource;
  private readonly clock: () => Date;
  private readonly include: string[];
  private readonly exclude: string[];

  constructor(opts: EngineOptions) {
    this.root = opts.root;
    this.store = opts.store;
    this.policy = opts.policy;
    this.codec = opts.codec ?? defaultCodec;
    this.attribution = opts.attribution ?? new StaticAttribution();
    this.clock = opts.clock ?? (() => new Date());
    this.include = opts.include;
    this.exclude = opts.exclude;
  }

  private now(): string {
    return this.clock().toISOString();
  }

  /** Raw scan: finalized artifacts carry only their inline projection. `paths` narrows it to files or directories. */
  scan(paths: readonly string[] = []): Promise<ScanResult> {
    return scan(this.root, {
      include: this.include,
      exclude: this.exclude,
      codec: this.codec,
      scopes: resolveScopes(this.root, paths),
    });
  }

  /** Scan with finalized artifacts' full records taken from the registry. */
  async records(): Promise<ScanResult> {
    const [scanned, registry] = await Promise.all([this.scan(), this.store.load()]);
    return { records: hydrate(scanned.records, registry), errors: scanned.errors };
  }

  /** Rescan the artifact's file and return its current record. */
  private async locate(ref: ArtifactRef): Promise<ArtifactRecord> {
    const id = typeof ref === "string" ? ref : ref.id;
    const file = typeof ref === "string" ? fileOfId(ref) : ref.file;

    let scanned: ScanResult;
    try {
      scanned = await scanFile(this.root, file, this.codec);
    } catch (e) {
      if (e instanceof ProvenanceError) throw e;
      throw new ArtifactNotFound(id);
    }
    const issue = scanned.errors.find((i) => i.artifactId === id || i.artifactId === null);
    if (issue) throw issue.error;

    const record = scanned.records.find((r) => r.artifact.id === id);
    if (!record) throw new ArtifactNotFound(id);
    return record;
  }

  private requireMetadata(record: ArtifactRecord): TagMetadata {
    if (record.metadata === null || stageOf(record.metadata) === "pristine") {
      throw new LifecycleError(record.artifact.id, "artifact is not annotated");
    }
    return record.metadata;
  }

  private async attributionFor(artifact: Artifact): Promise<string> {
    return (await this.attribution.describe(artifact.file, artifact.span.line)) ?? UNKNOWN_ATTRIBUTION;
  }

  /** Pristine → annotated; writes the block above the declaration. */
  annotate(ref: ArtifactRef, agent: string, notes: string | null = null): Promise<TagMetadata> {
    return this.store.transaction(async () => {
      const record = await this.locate(ref);
      const res = transitions.annotate(record.metadata, {
        artifactId: record.artifact.id,
        aiComposed: agent,
        notes,
        attribution: await this.attributionFor(record.artifact),
        now: this.now(),
      });
      if (!res.ok) throw res.error;

      await this.write([{ artifact: record.artifact, payload: metadataToPayload(res.metadata) }]);
      log.info({ artifact: record.artifact.id, agent }, "annotated");
      return res.metadata;
    });
  }

  /** Annotate every pristine artifact, or those under `paths`. Returns the identities annotated. */
  annotateAll(agent: string, notes: string | null = null, paths: readonly string[] = []): Promise<string[]> {
    return this.store.transaction(async () => {
      const { records } = await this.scan(paths);
      const now = this.now();
      const updates: AnnotationUpdate[] = [];

      for (const record of records) {
        if (stageOf(record.metadata) !== "pristine") continue;
        const res = transitions.annotate(record.metadata, {
          artifactId: record.artifact.id,
          aiComposed: agent,
          notes,
          attribution: await this.attributionFor(record.artifact),
          now,
        });
        if (res.ok) updates.push({ artifact: record.artifact, payload: metadataToPayload(res.metadata) });
      }

      await this.write(updates);
      log.info({ count: updates.length, agent }, "annotated pristine artifacts");
      return updates.map((u) => u.artifact.id);
    });
  }

  /**
   * Human certification. A finalized artifact is refreshed only with
   * `includeExisting`: its registry record comes back inline with the new
   * review and the entry is archived. The inline write lands first, so an
   * interruption is finished by reconcile.
   */
  certify(
    ref: ArtifactRef,
    reviewer: string,
    scrutiny: Scrutiny,
    notes: string | null = null,
    includeExisting = false,
  ): Promise<TagMetadata> {
    return this.store.transaction(async (tx) => {
      const record = await this.locate(ref);
      const step = this.certifyStep(record, tx.registry, {
        artifactId: record.artifact.id,
        reviewer,
        scrutiny,
        notes,
        includeExisting,
        now: this.now(),
      });
      if (!step.ok) throw step.error;

      await this.write([{ artifact: record.artifact, payload: metadataToPayload(step.metadata) }]);
      if (step.archive) await tx.commit(withoutEntry(tx.registry, step.archive));
      log.info({ artifact: record.artifact.id, reviewer, scrutiny, refreshed: step.archive !== null }, "certified");
      return step.metadata;
    });
  }

  /**
   * Certify every artifact still waiting for a human review, or with
   * `includeExisting` every annotated one, under `paths`. Artifacts the
   * transition refuses are reported with the reason.
   */
  certifyAll(reviewer: string, scrutiny: Scrutiny, opts: CertifyAllOptions = {}): Promise<CertifyAllResult> {
    return this.store.transaction(async (tx) => {
      const { records } = await this.scan(opts.paths ?? []);
      const includeExisting = opts.includeExisting ?? false;
      const now = this.now();
      const result: CertifyAllResult = { certified: [], skipped: [] };
      const updates: AnnotationUpdate[] = [];
      let registry = tx.registry;

      for (const record of records) {
        const m = record.metadata;
        if (m === null || stageOf(m) === "pristine") continue;
        if (!includeExisting && !awaitsHumanReview(m)) continue;

        const step = this.certifyStep(record, tx.registry, {
          artifactId: record.artifact.id,
          reviewer,
          scrutiny,
          notes: opts.notes ?? null,
          includeExisting,
          now,
        });
        if (!step.ok) {
          result.skipped.push({ id: record.artifact.id, reason: step.error.message });
          continue;
        }
        updates.push({ artifact: record.artifact, payload: metadataToPayload(step.metadata) });
        if (step.archive) registry = withoutEntry(registry, step.archive);
        result.certified.push(record.artifact.id);
      }

      await this.write(updates);
      if (registry !== tx.registry) await tx.commit(registry);
      log.info({ certified: result.certified.length, skipped: result.skipped.length, reviewer }, "certify batch complete");
      return result;
    });
  }

  private certifyStep(record: ArtifactRecord, registry: Registry, input: transitions.CertifyInput): CertifyStep {
    const current = record.metadata;
    if (current === null || stageOf(current) === "pristine") {
      return { ok: false, error: new LifecycleError(record.artifact.id, "artifact is not annotated") };
    }
    if (!current.done || !input.includeExisting) {
      const res = transitions.certifyHuman(current, input, this.policy);
      return res.ok ? { ok: true, metadata: res.metadata, archive: null } : res;
    }

    const entry = registry.entries.get(record.artifact.id);
    if (!entry) {
      return { ok: false, error: new AnnotationCorruption(record.artifact.id, "marked done but the registry has no entry for it") };
    }
    const res = transitions.recertify(entry, { ...input, liveDigest: record.artifact.digest }, this.policy);
    return res.ok ? { ok: true, metadata: res.metadata, archive: res.archive } : res;
  }

  /** Agent certification. Throws AgentPermissionError without touching the source when not permitted. */
  certifyAgent(
    ref: ArtifactRef,
    agentId: string,
    scrutiny: Scrutiny | null = null,
    notes: string | null = null,
    aiComposed: string | null = null,
  ): Promise<TagMetadata> {
    return this.store.transaction(async () => {
      const record = await this.locate(ref);
      const res = transitions.certifyAgent(
        this.requireMetadata(record),
        { artifactId: record.artifact.id, agentId, scrutiny, notes, aiComposed, now: this.now() },
        this.policy.integrations.agents,
      );
      if (!res.ok) throw res.error;

      await this.write([{ artifact: record.artifact, payload: metadataToPayload(res.metadata) }]);
      log.info({ artifact: record.artifact.id, agent: agentId }, "agent certified");
      return res.metadata;
    });
  }

  /**
   * Under review → finalized. The registry entry is committed before the
   * inline block collapses; reconcile completes the second step if it is lost.
   */
  finalize(ref: ArtifactRef): Promise<RegistryEntry> {
    return this.store.transaction(async (tx) => {
      const record = await this.locate(ref);
      const res = transitions.finalize(
        this.requireMetadata(record),
        { artifactId: record.artifact.id, digest: record.artifact.digest, now: this.now() },
        this.policy,
      );
      if (!res.ok) throw res.error;

      await tx.commit(withEntry(tx.registry, res.entry));
      await this.write([{ artifact: record.artifact, payload: res.projection }]);
      log.info({ artifact: record.artifact.id, digest: res.entry.digest }, "finalized");
      return res.entry;
    });
  }

  /** Finalize every artifact that qualifies; the rest are reported with the reason. */
  finalizeAll(): Promise<FinalizeAllResult> {
    return this.store.transaction(async (tx) => {
      const { records } = await this.scan();
      const now = this.now();
      const result: FinalizeAllResult = { finalized: [], skipped: [] };
      const updates: AnnotationUpdate[] = [];
      let registry = tx.registry;

      for (const record of records) {
        if (record.metadata === null || stageOf(record.metadata) !== "under_review") continue;
        const res = transitions.finalize(
          record.metadata,
          { artifactId: record.artifact.id, digest: record.artifact.digest, now },
          this.policy,
        );
        if (!res.ok) {
          result.skipped.push({ id: record.artifact.id, reason: res.error.message });
          continue;
        }
        registry = withEntry(registry, res.entry);
        updates.push({ artifact: record.artifact, payload: res.projection });
        result.finalized.push(res.entry);
      }

      if (result.finalized.length > 0) {
        await tx.commit(registry);
        await this.write(updates);
      }
      log.info({ finalized: result.finalized.length, skipped: result.skipped.length }, "finalize batch complete");
      return result;
    });
  }

  /** Detect digest drift, reopen drifted artifacts and finish interrupted transitions. */
  reconcile(): Promise<ReconcileResult> {
    return reconcile({
      root: this.root,
      store: this.store,
      codec: this.codec,
      scan: () => this.scan(),
      now: () => this.now(),
    });
  }

  /**
   * Pre-commit gate: annotate pristine artifacts under `paths` (unless the
   * policy ignores unannotated code), then evaluate the policy over them.
   */
  async preCommit(paths: readonly string[], agent: string, notes: string | null = null): Promise<PreCommitResult> {
    const annotated = this.policy.enforcement.ignore_unannotated ? [] : await this.annotateAll(agent, notes, paths);
    const [scanned, registry] = await Promise.all([this.scan(paths), this.store.load()]);
    const report = evaluatePolicy(hydrate(scanned.records, registry), this.policy);
    for (const v of report.violations) log.error({ kind: v.kind, artifact: v.artifactId }, v.message);
    return { annotated, report, errors: scanned.errors };
  }

  /** Policy verdict. Without `records`, scans and hydrates the repository first. */
  async evaluatePolicy(records?: readonly ArtifactRecord[]): Promise<PolicyReport> {
    if (records) return evaluatePolicy(records, this.policy);
    return (await this.check()).report;
  }

  /** Read-only verdict, with orphaned registry entries and scan errors. */
  async check(): Promise<CheckResult> {
    const [scanned, registry] = await Promise.all([this.scan(), this.store.load()]);
    const seen = new Set<string>(scanned.records.map((r) => r.artifact.id));
    for (const issue of scanned.errors) if (issue.artifactId) seen.add(issue.artifactId);
    const orphaned = [...registry.entries.keys()].filter((id) => !seen.has(id)).sort();

    const records = hydrate(scanned.records, registry);
    return { report: evaluatePolicy(records, this.policy, { orphans: orphaned }), orphaned, errors: scanned.errors };
  }

  private async write(updates: readonly AnnotationUpdate[]): Promise<void> {
    if (updates.length === 0) return;
    await writeAnnotations(this.root, updates, this.codec);
  }
}

/** Not finalized, and either never human-certified or reopened since. */
function awaitsHumanReview(m: TagMetadata): boolean {
  return !m.done && (isPendingCertification(m) || m.reopened_at !== null);
}

/** Replace a finalized artifact's inline projection with the registry's full record. */
export function hydrate(records: readonly ArtifactRecord[], registry: Registry): ArtifactRecord[] {
  return records.map((record) => {
    if (!record.metadata?.done) return record;
    const entry = registry.entries.get(record.artifact.id);
    return entry ? { artifact: record.artifact, metadata: entry.metadata } : record;
  });
}
