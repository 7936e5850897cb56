import { createContext, toFailure, type CommandFailure, type CommonOpts } from "./context.js";

export type ReconcileSummary = {
  reopened: Array<{ id: string; previousDigest: string; currentDigest: string }>;
  orphaned: string[];
  recovered: string[];
  corrupt: Array<{ id: string | null; reason: string }>;
};

export type ReconcileCommandResult = ({ ok: true } & ReconcileSummary) | CommandFailure;

export async function reconcileCommand(opts: CommonOpts): Promise<ReconcileCommandResult> {
  try {
    const { engine } = createContext(opts);
    const res = await engine.reconcile();
    return {
      ok: true,
      reopened: res.reopened.map((r) => ({ id: r.id, previousDigest: r.previousDigest, currentDigest: r.currentDigest })),
      orphaned: res.orphaned.map((o) => o.artifactId),
      recovered: res.recovered,
      corrupt: res.corrupt.map((c) => ({ id: c.artifactId, reason: c.reason })),
    };
  } catch (e) {
    return toFailure(e);
  }
}
