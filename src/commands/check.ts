import { formatRatio } from "../policy/evaluator.js";
import type { PolicyReport } from "../types/report.js";
import { createContext, invalidArgs, toFailure, type CommandFailure, type CommonOpts } from "./context.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { issueRows, type IssueRow } from "./scan.js";

export type CheckOpts = CommonOpts & {
  /** Reconcile before evaluating, so drifted artifacts count as reopened. */
  reconcile?: boolean;
};

export type CheckCommandResult =
  | { ok: true; report: PolicyReport; orphaned: string[]; reopened: string[]; issues: IssueRow[]; exitCode: ExitCode }
  | CommandFailure;

/** Policy verdict for the repository. A failing policy is still `ok`, with exit code 1. */
export async function checkCommand(opts: CheckOpts): Promise<CheckCommandResult> {
  try {
    const { engine } = createContext(opts);
    const reopened = opts.reconcile === false ? [] : (await engine.reconcile()).reopened.map((r) => r.id);
    const { report, orphaned, errors } = await engine.check();
    return {
      ok: true,
      report,
      orphaned,
      reopened,
      issues: issueRows(errors),
      exitCode: report.status === "pass" ? EXIT.SUCCESS : EXIT.POLICY_FAILED,
    };
  } catch (e) {
    return toFailure(e);
  }
}

export const REPORT_FORMATS = ["text", "json", "md"] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

function isReportFormat(value: string): value is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(value);
}

/** Render a policy report for people (text, md) or machines (json). */
export function renderReport(report: PolicyReport, format: ReportFormat): string {
  if (format === "json") return JSON.stringify(report, null, 2) + "\n";

  const lines: string[] = [];
  if (format === "md") {
    lines.push("# Provenance report", "");
    lines.push("| metric | value |", "| --- | --- |");
    lines.push(`| status | ${report.status} |`);
    lines.push(`| coverage | ${formatRatio(report.coverage_ratio)} (${report.certified}/${report.eligible}) |`);
    lines.push(`| agent coverage | ${formatRatio(report.agent_ratio)} |`);
    lines.push(`| finalized | ${report.counts.finalized} |`);
    lines.push(`| ai-composed, uncertified | ${report.counts.ai_pending} |`);
    if (report.violations.length > 0) {
      lines.push("", "## Violations", "");
      for (const v of report.violations) lines.push(`- \`${v.kind}\`: ${v.message}`);
    }
    if (report.pending.length > 0) {
      lines.push("", "## Pending", "");
      for (const id of report.pending) lines.push(`- \`${id}\``);
    }
    return lines.join("\n") + "\n";
  }

  lines.push(`status: ${report.status}`);
  lines.push(`coverage: ${formatRatio(report.coverage_ratio)} (${report.certified}/${report.eligible})`);
  lines.push(`agent coverage: ${formatRatio(report.agent_ratio)}`);
  lines.push(`finalized: ${report.counts.finalized}, ai-composed uncertified: ${report.counts.ai_pending}`);
  for (const v of report.violations) lines.push(`violation ${v.kind}: ${v.message}`);
  return lines.join("\n") + "\n";
}

export type ReportOpts = CommonOpts & { reportFormat: string };

export type ReportCommandResult = { ok: true; output: string } | CommandFailure;

/** Read-only; never reconciles. */
export async function reportCommand(opts: ReportOpts): Promise<ReportCommandResult> {
  if (!isReportFormat(opts.reportFormat)) {
    return invalidArgs(`unknown report format "${opts.reportFormat}" (expected ${REPORT_FORMATS.join("|")})`);
  }
  try {
    const { engine } = createContext(opts);
    const { report } = await engine.check();
    return { ok: true, output: renderReport(report, opts.reportFormat) };
  } catch (e) {
    return toFailure(e);
  }
}
