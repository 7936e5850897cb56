import { parseScrutiny } from "../metadata/model.js";
import type { Scrutiny, TagMetadata } from "../types/metadata.js";
import type { RegistryEntry } from "../types/registry.js";
import type { CertifyAllResult, FinalizeAllResult } from "../core/engine.js";
import { createContext, invalidArgs, toFailure, type CommandFailure, type CommonOpts } from "./context.js";

export type MetadataResult = { ok: true; id: string; metadata: TagMetadata } | CommandFailure;

export type AnnotateOpts = CommonOpts & {
  /** Identity to annotate; omitted with `all` or `paths`. */
  id?: string;
  all?: boolean;
  /** Annotate every pristine artifact under these files or directories. */
  paths?: string[];
  agent: string;
  notes?: string;
};

export type AnnotateResult = { ok: true; annotated: string[] } | CommandFailure;

export async function annotateCommand(opts: AnnotateOpts): Promise<AnnotateResult> {
  const paths = opts.paths ?? [];
  if (!opts.id && !opts.all && paths.length === 0) return invalidArgs("an artifact id, --path or --all is required");
  if (opts.id && (opts.all || paths.length > 0)) return invalidArgs("an artifact id cannot be combined with --path or --all");
  try {
    const { engine } = createContext(opts);
    if (opts.all || paths.length > 0) {
      return { ok: true, annotated: await engine.annotateAll(opts.agent, opts.notes ?? null, opts.all ? [] : paths) };
    }
    const id = opts.id ?? "";
    await engine.annotate(id, opts.agent, opts.notes ?? null);
    return { ok: true, annotated: [id] };
  } catch (e) {
    return toFailure(e);
  }
}

function scrutinyArg(value: string | undefined, fallback: Scrutiny | null): Scrutiny | null | CommandFailure {
  if (value === undefined) return fallback;
  return parseScrutiny(value) ?? invalidArgs(`unknown scrutiny "${value}" (expected auto|low|medium|high)`);
}

export type CertifyOpts = CommonOpts & {
  id: string;
  reviewer: string;
  scrutiny?: string;
  notes?: string;
  includeExisting?: boolean;
};

export async function certifyCommand(opts: CertifyOpts): Promise<MetadataResult> {
  const scrutiny = scrutinyArg(opts.scrutiny, "medium");
  if (scrutiny === null) return invalidArgs("scrutiny is required");
  if (typeof scrutiny !== "string") return scrutiny;
  try {
    const { engine } = createContext(opts);
    const metadata = await engine.certify(opts.id, opts.reviewer, scrutiny, opts.notes ?? null, opts.includeExisting ?? false);
    return { ok: true, id: opts.id, metadata };
  } catch (e) {
    return toFailure(e);
  }
}

export type CertifyBatchOpts = CommonOpts & {
  /** Files or directories to certify in. */
  paths?: string[];
  /** Every pending artifact in the repository, or under `paths`. Defaults scrutiny to high. */
  allPending?: boolean;
  reviewer: string;
  scrutiny?: string;
  notes?: string;
  includeExisting?: boolean;
};

export type CertifyBatchResult = ({ ok: true } & CertifyAllResult) | CommandFailure;

export async function certifyBatchCommand(opts: CertifyBatchOpts): Promise<CertifyBatchResult> {
  const paths = opts.paths ?? [];
  if (!opts.allPending && paths.length === 0) return invalidArgs("--path or --all-pending is required");
  if (opts.allPending && opts.includeExisting) return invalidArgs("--all-pending cannot be combined with --include-existing");
  const scrutiny = scrutinyArg(opts.scrutiny, opts.allPending ? "high" : "medium");
  if (scrutiny === null) return invalidArgs("scrutiny is required");
  if (typeof scrutiny !== "string") return scrutiny;
  try {
    const { engine } = createContext(opts);
    const res = await engine.certifyAll(opts.reviewer, scrutiny, {
      notes: opts.notes ?? null,
      includeExisting: opts.includeExisting ?? false,
      paths,
    });
    return { ok: true, ...res };
  } catch (e) {
    return toFailure(e);
  }
}

export type CertifyAgentOpts = CommonOpts & {
  id: string;
  agent: string;
  scrutiny?: string;
  notes?: string;
  aiComposed?: string;
};

export async function certifyAgentCommand(opts: CertifyAgentOpts): Promise<MetadataResult> {
  const scrutiny = scrutinyArg(opts.scrutiny, null);
  if (scrutiny !== null && typeof scrutiny !== "string") return scrutiny;
  try {
    const { engine } = createContext(opts);
    const metadata = await engine.certifyAgent(opts.id, opts.agent, scrutiny, opts.notes ?? null, opts.aiComposed ?? null);
    return { ok: true, id: opts.id, metadata };
  } catch (e) {
    return toFailure(e);
  }
}

export type FinalizeOpts = CommonOpts & {
  id?: string;
  all?: boolean;
};

export type FinalizeCommandResult = { ok: true; entries: RegistryEntry[]; skipped: FinalizeAllResult["skipped"] } | CommandFailure;

export async function finalizeCommand(opts: FinalizeOpts): Promise<FinalizeCommandResult> {
  if (!opts.id && !opts.all) return invalidArgs("an artifact id or --all is required");
  try {
    const { engine } = createContext(opts);
    if (opts.all) {
      const res = await engine.finalizeAll();
      return { ok: true, entries: res.finalized, skipped: res.skipped };
    }
    const entry = await engine.finalize(opts.id ?? "");
    return { ok: true, entries: [entry], skipped: [] };
  } catch (e) {
    return toFailure(e);
  }
}
