import type { PolicyReport } from "../types/report.js";
import { createContext, toFailure, type CommandFailure, type CommonOpts } from "./context.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { issueRows, type IssueRow } from "./scan.js";

export const HOOK_NOTES = "auto-tagged by the pre-commit hook";

export type HookOpts = CommonOpts & {
  /** Files handed over by the hook runner, usually the staged ones. */
  paths: string[];
  /** Recorded as ai_composed on new annotations. */
  agent?: string;
  /** When false, violations are reported but the commit goes through. */
  block?: boolean;
};

export type HookResult =
  | { ok: true; annotated: string[]; report: PolicyReport | null; issues: IssueRow[]; exitCode: ExitCode }
  | CommandFailure;

/** Annotate the changed files, then hold the commit back on a policy violation. */
export async function hookCommand(opts: HookOpts): Promise<HookResult> {
  if (opts.paths.length === 0) {
    return { ok: true, annotated: [], report: null, issues: [], exitCode: EXIT.SUCCESS };
  }
  try {
    const { engine } = createContext(opts);
    const res = await engine.preCommit(opts.paths, opts.agent ?? "pending", HOOK_NOTES);
    const blocked = res.report.status === "fail" && opts.block !== false;
    return {
      ok: true,
      annotated: res.annotated,
      report: res.report,
      issues: issueRows(res.errors),
      exitCode: blocked ? EXIT.POLICY_FAILED : EXIT.SUCCESS,
    };
  } catch (e) {
    return toFailure(e);
  }
}
