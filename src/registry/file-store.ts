import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { RegistryCorruption, errorMessage, isErrnoException } from "../errors.js";
import { atomicWriteFile } from "../fs/atomic.js";
import { getLogger } from "../logging/logger.js";
import { metadataFromPayload, metadataToPayload } from "../metadata/model.js";
import { defaultSchemas } from "../schema/registry.js";
import type { ArchiveReason, ArchiveRecord, Registry } from "../types/registry.js";
import { acquireFsLock, LockTimeoutError } from "./lock.js";
import { emptyRegistry, type RegistryStore, type RegistryTransaction } from "./store.js";

const log = getLogger("registry");

export const REGISTRY_FORMAT_VERSION = 1;

export type FileRegistryOptions = {
  dir: string;
  file: string;
  lockTimeoutMs: number;
  staleLockMs: number;
};

type PersistedEntry = { digest: string; finalized_at: string; metadata: Record<string, unknown> };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isArchiveReason(value: unknown): value is ArchiveReason {
  return value === "digest_mismatch" || value === "interrupted_reopen" || value === "recertified";
}

/** Registry persisted as one YAML document per repository. */
export class FileRegistryStore implements RegistryStore {
  readonly path: string;
  private readonly lockPath: string;

  constructor(
    root: string,
    private readonly opts: FileRegistryOptions,
  ) {
    this.path = path.resolve(root, opts.dir, opts.file);
    this.lockPath = `${this.path}.lock`;
  }

  async load(): Promise<Registry> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (e) {
      if (isErrnoException(e, "ENOENT")) return emptyRegistry();
      throw new RegistryCorruption(this.path, `unreadable: ${errorMessage(e)}`);
    }
    return this.parse(raw);
  }

  /** Never repairs: anything unexpected is a RegistryCorruption. */
  parse(raw: string): Registry {
    let doc: unknown;
    try {
      doc = YAML.parse(raw);
    } catch (e) {
      throw new RegistryCorruption(this.path, `invalid YAML: ${errorMessage(e)}`);
    }
    if (doc === null || doc === undefined) return emptyRegistry();

    const check = defaultSchemas().validate("registry", doc, "registry");
    if (!check.valid || !isRecord(doc)) {
      throw new RegistryCorruption(this.path, check.errors ?? "registry is not a mapping");
    }

    const registry = emptyRegistry();
    const artifacts = isRecord(doc.artifacts) ? doc.artifacts : {};
    for (const [id, value] of Object.entries(artifacts)) {
      if (!isRecord(value)) continue;
      try {
        registry.entries.set(id, {
          id,
          digest: String(value.digest),
          finalized_at: String(value.finalized_at),
          metadata: metadataFromPayload(id, value.metadata),
        });
      } catch (e) {
        throw new RegistryCorruption(this.path, `entry ${id}: ${errorMessage(e)}`);
      }
    }

    const archive = Array.isArray(doc.archive) ? doc.archive : [];
    for (const row of archive) {
      if (!isRecord(row) || !isArchiveReason(row.reason)) continue;
      registry.archive.push({
        id: String(row.id),
        archived_at: String(row.archived_at),
        reason: row.reason,
        old_digest: String(row.old_digest),
        new_digest: String(row.new_digest),
      });
    }
    return registry;
  }

  serialize(registry: Registry): string {
    const artifacts: Record<string, PersistedEntry> = {};
    const ids = [...registry.entries.keys()].sort();
    for (const id of ids) {
      const entry = registry.entries.get(id);
      if (!entry) continue;
      artifacts[id] = { digest: entry.digest, finalized_at: entry.finalized_at, metadata: metadataToPayload(entry.metadata) };
    }
    const doc: { version: number; artifacts: Record<string, PersistedEntry>; archive?: ArchiveRecord[] } = {
      version: REGISTRY_FORMAT_VERSION,
      artifacts,
    };
    if (registry.archive.length > 0) doc.archive = registry.archive.map((r) => ({ ...r }));
    return YAML.stringify(doc, { lineWidth: 0 });
  }

  async save(registry: Registry): Promise<void> {
    await atomicWriteFile(this.path, this.serialize(registry));
    log.debug({ path: this.path, entries: registry.entries.size }, "registry saved");
  }

  async transaction<T>(fn: (tx: RegistryTransaction) => Promise<T>): Promise<T> {
    let release: () => Promise<void>;
    try {
      release = await acquireFsLock(this.lockPath, { timeoutMs: this.opts.lockTimeoutMs, staleMs: this.opts.staleLockMs });
    } catch (e) {
      if (e instanceof LockTimeoutError) {
        throw new RegistryCorruption(this.path, `lock timeout after ${this.opts.lockTimeoutMs}ms (${e.lockPath})`);
      }
      throw e;
    }

    try {
      const registry = await this.load();
      return await fn({ registry, commit: (next) => this.save(next) });
    } finally {
      await release();
    }
  }
}

