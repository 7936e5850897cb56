export {
  ProvenanceEngine,
  hydrate,
  type ArtifactRef,
  type EngineOptions,
  type CheckResult,
  type CertifyAllOptions,
  type CertifyAllResult,
  type PreCommitResult,
} from "./core/engine.js";
export { YamlBlockCodec, defaultCodec, type AnnotationCodec } from "./annotation/codec.js";
export { applyEdits, type TextEdit } from "./annotation/edits.js";
export { canonicalize } from "./digest/canonical.js";
export { digestNode } from "./digest/digest.js";
export { scan, scanFile, listSourceFiles, resolveScopes } from "./scanner/scanner.js";
export { scanSource } from "./scanner/source-file.js";
export * from "./metadata/model.js";
export { STAGES, stageOf, canTransition, type Stage } from "./lifecycle/state-machine.js";
export { annotate, certifyHuman, certifyAgent, recertify, finalize, reopen } from "./lifecycle/transitions.js";
export { resolveAgentPermission } from "./lifecycle/permissions.js";
export { FileRegistryStore } from "./registry/file-store.js";
export { emptyRegistry, type RegistryStore, type RegistryTransaction } from "./registry/store.js";
export { planReconciliation } from "./reconcile/plan.js";
export { reconcile, type ReconcileResult, type ReopenedArtifact } from "./reconcile/reconciler.js";
export { evaluatePolicy } from "./policy/evaluator.js";
export { defaultPolicy, loadPolicy, normalizePolicy } from "./policy/loader.js";
export { GitAttribution, StaticAttribution, type AttributionSource } from "./git/attribution.js";
export * from "./errors.js";
export type * from "./types/artifact.js";
export type * from "./types/metadata.js";
export type * from "./types/policy.js";
export type * from "./types/registry.js";
export type * from "./types/report.js";
export { SCRUTINY_LEVELS } from "./types/metadata.js";
