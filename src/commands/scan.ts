import { stageOf, type Stage } from "../lifecycle/state-machine.js";
import type { ArtifactKind, ScanIssue } from "../types/artifact.js";
import { createContext, toFailure, type CommandFailure, type CommonOpts } from "./context.js";

export type ScanRow = {
  id: string;
  kind: ArtifactKind;
  line: number;
  stage: Stage;
  digest: string;
};

export type IssueRow = {
  file: string;
  artifactId: string | null;
  code: string;
  message: string;
};

export type ScanCommandResult = { ok: true; artifacts: ScanRow[]; issues: IssueRow[] } | CommandFailure;

export function issueRows(errors: readonly ScanIssue[]): IssueRow[] {
  return errors.map((e) => ({ file: e.file, artifactId: e.artifactId, code: e.error.code, message: e.error.message }));
}

/** List every artifact with its lifecycle stage. */
export async function scanCommand(opts: CommonOpts): Promise<ScanCommandResult> {
  try {
    const { engine } = createContext(opts);
    const { records, errors } = await engine.records();
    return {
      ok: true,
      artifacts: records.map(({ artifact, metadata }) => ({
        id: artifact.id,
        kind: artifact.kind,
        line: artifact.span.line,
        stage: stageOf(metadata),
        digest: artifact.digest,
      })),
      issues: issueRows(errors),
    };
  } catch (e) {
    return toFailure(e);
  }
}
