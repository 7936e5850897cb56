import type { ArchiveRecord, Registry, RegistryEntry } from "../types/registry.js";

export type RegistryTransaction = {
  /** Snapshot loaded under the lock. */
  readonly registry: Registry;
  /** Persist `next` immediately, still under the lock. May be called more than once. */
  commit(next: Registry): Promise<void>;
};

/**
 * Durable store of finalized records, reachable by independent processes.
 * Lifecycle and policy code never touch it; the engine and reconciler do.
 */
export interface RegistryStore {
  load(): Promise<Registry>;
  save(registry: Registry): Promise<void>;
  /** Run `fn` holding the exclusive lock. The lock is released on every exit path. */
  transaction<T>(fn: (tx: RegistryTransaction) => Promise<T>): Promise<T>;
}

export function emptyRegistry(): Registry {
  return { entries: new Map(), archive: [] };
}

/** Copy with `entry` added or replaced. */
export function withEntry(registry: Registry, entry: RegistryEntry): Registry {
  const entries = new Map(registry.entries);
  entries.set(entry.id, entry);
  return { entries, archive: [...registry.archive] };
}

/** Copy with the entry removed and an archive row appended. */
export function withoutEntry(registry: Registry, record: ArchiveRecord): Registry {
  const entries = new Map(registry.entries);
  entries.delete(record.id);
  return { entries, archive: [...registry.archive, record] };
}
