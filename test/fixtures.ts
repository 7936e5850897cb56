import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { resolveConfig } from "../src/config/validator.js";
import { ProvenanceEngine } from "../src/core/engine.js";
import { StaticAttribution } from "../src/git/attribution.js";
import { emptyMetadata } from "../src/metadata/model.js";
import { defaultPolicy } from "../src/policy/loader.js";
import { FileRegistryStore } from "../src/registry/file-store.js";
import type { Artifact, ArtifactRecord } from "../src/types/artifact.js";
import type { TagMetadata } from "../src/types/metadata.js";
import type { PolicyConfig } from "../src/types/policy.js";

/** config/base.yaml with no environment overrides. */
export const BASE_CONFIG = resolveConfig({ env: {} });

export const T0 = "2026-01-01T00:00:00.000Z";

/** Clock that advances one second per call, starting one second after T0. */
export function steppingClock(start = T0): () => Date {
  let t = Date.parse(start);
  return () => {
    t += 1000;
    return new Date(t);
  };
}

export function makeTmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `provenant-${prefix}-`));
}

export function writeSource(root: string, rel: string, text: string): void {
  const abs = path.join(root, rel);
  fs.mkdirSync(path.dirname(abs), { recursive: true });
  fs.writeFileSync(abs, text, "utf8");
}

export function readSource(root: string, rel: string): string {
  return fs.readFileSync(path.join(root, rel), "utf8");
}

export function makeStore(root: string, lockTimeoutMs = 2000): FileRegistryStore {
  return new FileRegistryStore(root, {
    dir: ".provenant",
    file: "registry.yaml",
    lockTimeoutMs,
    staleLockMs: 300_000,
  });
}

export function makeEngine(root: string, policy: PolicyConfig = defaultPolicy()): ProvenanceEngine {
  return new ProvenanceEngine({
    root,
    store: makeStore(root),
    policy,
    attribution: new StaticAttribution("last_commit=abc1234 by dev"),
    clock: steppingClock(),
    include: BASE_CONFIG.include,
    exclude: [...BASE_CONFIG.exclude, ".provenant/**"],
  });
}

/** Policy with agent integrations switched on. */
export function agentPolicy(overrides: Partial<PolicyConfig["integrations"]["agents"]> = {}): PolicyConfig {
  const policy = defaultPolicy();
  policy.integrations.agents = {
    ...policy.integrations.agents,
    enabled: true,
    allow_coverage_credit: true,
    reviewers: [{ id: "bot-x", max_scrutiny: "medium", allow_finalize: false, notes: null }],
    ...overrides,
  };
  return policy;
}

export function makeArtifact(id: string, digest = "0".repeat(64)): Artifact {
  const file = id.split("::")[0];
  return {
    id,
    file,
    qualifiedName: id.split("::")[1] ?? id,
    kind: "function",
    span: { start: 0, end: 10, line: 1, endLine: 1 },
    insertAt: 0,
    sharesLine: false,
    indent: "",
    annotation: null,
    digest,
  };
}

export function metadata(overrides: Partial<TagMetadata> = {}): TagMetadata {
  return { ...emptyMetadata(), history: [`${T0} annotated`], ...overrides };
}

export function record(id: string, m: TagMetadata | null): ArtifactRecord {
  return { artifact: makeArtifact(id), metadata: m };
}

export const CART_SOURCE = `/** Shopping cart helpers. */
export function add(a: number, b: number): number {
  return a + b;
}

export class Cart {
  private items: number[] = [];

  push(value: number): void {
    this.items.push(value);
  }

  total(): number {
    return this.items.reduce((sum, x) => add(sum, x), 0);
  }
}
`;
