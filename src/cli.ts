#!/usr/bin/env node

import { Command } from "commander";
import { checkCommand, reportCommand } from "./commands/check.js";
import { configShow } from "./commands/config.js";
import type { CommandFailure, CommonOpts, OutputFormat } from "./commands/context.js";
import { EXIT } from "./commands/exit-codes.js";
import { hookCommand } from "./commands/hook.js";
import {
  annotateCommand,
  certifyAgentCommand,
  certifyBatchCommand,
  certifyCommand,
  finalizeCommand,
} from "./commands/lifecycle.js";
import { reconcileCommand } from "./commands/reconcile.js";
import { scanCommand } from "./commands/scan.js";
import { formatRatio } from "./policy/evaluator.js";

type GlobalOpts = { root?: string; configDir?: string; env?: string; policy?: string; format: OutputFormat };

const program = new Command();

program
  .name("provenant")
  .description("Track who wrote and who reviewed each function and class")
  .version("0.1.0");

function withCommon(cmd: Command): Command {
  return cmd
    .option("--root <path>", "Repository root (default: current directory)")
    .option("--config-dir <path>", "Tool config directory")
    .option("--env <name>", "Config override layer (config/<name>.yaml)")
    .option("--policy <path>", "Policy file relative to the root")
    .option("--format <format>", "Output format: human|jsonl", "human");
}

function common(opts: GlobalOpts): CommonOpts {
  return { root: opts.root, configDir: opts.configDir, env: opts.env, policy: opts.policy };
}

function writeJsonl(value: unknown): void {
  process.stdout.write(JSON.stringify(value) + "\n");
}

function fail(res: CommandFailure, format: OutputFormat): never {
  if (format === "jsonl") {
    writeJsonl({ level: "error", code: res.error.code, message: res.error.message });
  } else {
    console.error(res.error.message);
  }
  process.exit(res.exitCode);
}

withCommon(program.command("scan").description("List artifacts and their lifecycle stage")).action(
  async (opts: GlobalOpts) => {
    const res = await scanCommand(common(opts));
    if (!res.ok) fail(res, opts.format);

    if (opts.format === "jsonl") {
      for (const a of res.artifacts) writeJsonl(a);
      for (const i of res.issues) writeJsonl({ level: "warn", ...i });
    } else {
      for (const a of res.artifacts) console.log(`${a.stage.padEnd(12)} ${a.id}`);
      for (const i of res.issues) console.error(`${i.code}: ${i.message}`);
    }
  },
);

withCommon(
  program
    .command("annotate")
    .description("Attach a provenance annotation to a pristine artifact")
    .argument("[id]", "Artifact identity (path::Qualified.name)")
    .option("--all", "Annotate every pristine artifact")
    .option("--path <paths...>", "Annotate pristine artifacts under these files or directories")
    .requiredOption("--agent <name>", "Model or agent that composed the code")
    .option("--notes <text>", "Free-form notes"),
).action(
  async (id: string | undefined, opts: GlobalOpts & { all?: boolean; path?: string[]; agent: string; notes?: string }) => {
  const res = await annotateCommand({
    ...common(opts),
    id,
    all: opts.all,
    paths: opts.path,
    agent: opts.agent,
    notes: opts.notes,
  });
  if (!res.ok) fail(res, opts.format);

  if (opts.format === "jsonl") {
    for (const annotated of res.annotated) writeJsonl({ level: "info", code: "ANNOTATED", id: annotated });
  } else {
    console.log(`Annotated ${res.annotated.length} artifact(s).`);
  }
  },
);

withCommon(
  program
    .command("certify")
    .description("Record a human review")
    .argument("[id]", "Artifact identity")
    .option("--path <paths...>", "Certify pending artifacts under these files or directories")
    .option("--all-pending", "Certify every artifact still waiting for a human review")
    .requiredOption("--reviewer <id>", "Reviewer identity")
    .option("--scrutiny <level>", "auto|low|medium|high (default: medium, high with --all-pending)")
    .option("--notes <text>", "Review notes")
    .option("--include-existing", "Refresh artifacts that are already certified or finalized"),
).action(
  async (
    id: string | undefined,
    opts: GlobalOpts & {
      path?: string[];
      allPending?: boolean;
      reviewer: string;
      scrutiny?: string;
      notes?: string;
      includeExisting?: boolean;
    },
  ) => {
    if (id === undefined) {
      const batch = await certifyBatchCommand({
        ...common(opts),
        paths: opts.path,
        allPending: opts.allPending,
        reviewer: opts.reviewer,
        scrutiny: opts.scrutiny,
        notes: opts.notes,
        includeExisting: opts.includeExisting,
      });
      if (!batch.ok) fail(batch, opts.format);

      if (opts.format === "jsonl") {
        for (const c of batch.certified) writeJsonl({ level: "info", code: "CERTIFIED", id: c });
        for (const s of batch.skipped) writeJsonl({ level: "warn", code: "SKIPPED", id: s.id, reason: s.reason });
      } else {
        console.log(`Certified ${batch.certified.length} artifact(s).`);
        for (const s of batch.skipped) console.error(`Skipped ${s.id}: ${s.reason}`);
      }
      return;
    }

    const res = await certifyCommand({
      ...common(opts),
      id,
      reviewer: opts.reviewer,
      scrutiny: opts.scrutiny,
      notes: opts.notes,
      includeExisting: opts.includeExisting,
    });
    if (!res.ok) fail(res, opts.format);

    if (opts.format === "jsonl") {
      writeJsonl({ level: "info", code: "CERTIFIED", id: res.id, scrutiny: res.metadata.scrutiny });
    } else {
      console.log(`Certified ${res.id} (${res.metadata.scrutiny}).`);
    }
  },
);

withCommon(
  program
    .command("certify-agent")
    .description("Record an automated review, within the agent's policy bounds")
    .argument("<id>", "Artifact identity")
    .requiredOption("--agent <id>", "Agent identity")
    .option("--scrutiny <level>", "auto|low|medium|high (default: the agent's maximum)")
    .option("--notes <text>", "Review notes")
    .option("--ai-composed <name>", "Set the composing model"),
).action(
  async (id: string, opts: GlobalOpts & { agent: string; scrutiny?: string; notes?: string; aiComposed?: string }) => {
    const res = await certifyAgentCommand({
      ...common(opts),
      id,
      agent: opts.agent,
      scrutiny: opts.scrutiny,
      notes: opts.notes,
      aiComposed: opts.aiComposed,
    });
    if (!res.ok) fail(res, opts.format);

    const latest = res.metadata.reviewers[res.metadata.reviewers.length - 1];
    if (opts.format === "jsonl") {
      writeJsonl({ level: "info", code: "AGENT_CERTIFIED", id: res.id, agent: latest.id, scrutiny: latest.scrutiny });
    } else {
      console.log(`Agent ${latest.id} certified ${res.id} (${latest.scrutiny}).`);
    }
  },
);

withCommon(
  program
    .command("finalize")
    .description("Move reviewed artifacts into the registry")
    .argument("[id]", "Artifact identity")
    .option("--all", "Finalize every artifact that qualifies"),
).action(async (id: string | undefined, opts: GlobalOpts & { all?: boolean }) => {
  const res = await finalizeCommand({ ...common(opts), id, all: opts.all });
  if (!res.ok) fail(res, opts.format);

  if (opts.format === "jsonl") {
    for (const e of res.entries) writeJsonl({ level: "info", code: "FINALIZED", id: e.id, digest: e.digest });
    for (const s of res.skipped) writeJsonl({ level: "warn", code: "SKIPPED", id: s.id, reason: s.reason });
  } else {
    for (const e of res.entries) console.log(`Finalized ${e.id}`);
    for (const s of res.skipped) console.error(`Skipped ${s.id}: ${s.reason}`);
  }
});

withCommon(program.command("reconcile").description("Reopen finalized artifacts whose code changed")).action(
  async (opts: GlobalOpts) => {
    const res = await reconcileCommand(common(opts));
    if (!res.ok) fail(res, opts.format);

    if (opts.format === "jsonl") {
      for (const r of res.reopened) writeJsonl({ level: "info", code: "REOPENED", ...r });
      for (const id of res.recovered) writeJsonl({ level: "warn", code: "RECOVERED", id });
      for (const id of res.orphaned) writeJsonl({ level: "warn", code: "ORPHANED", id });
      for (const c of res.corrupt) writeJsonl({ level: "error", code: "CORRUPT", ...c });
    } else {
      console.log(`Reopened ${res.reopened.length}, recovered ${res.recovered.length}, orphaned ${res.orphaned.length}.`);
      for (const c of res.corrupt) console.error(`${c.id ?? "?"}: ${c.reason}`);
    }
    if (res.corrupt.length > 0) process.exit(EXIT.OPERATION_FAILED);
  },
);

withCommon(
  program
    .command("check")
    .description("Reconcile, then evaluate the policy; exits 1 when it fails")
    .option("--no-reconcile", "Evaluate without reconciling first"),
).action(async (opts: GlobalOpts & { reconcile: boolean }) => {
  const res = await checkCommand({ ...common(opts), reconcile: opts.reconcile });
  if (!res.ok) fail(res, opts.format);

  const { report } = res;
  if (opts.format === "jsonl") {
    writeJsonl({ level: report.status === "pass" ? "info" : "error", code: "POLICY", ...report });
    for (const id of res.orphaned) writeJsonl({ level: "warn", code: "ORPHANED", id });
    for (const i of res.issues) writeJsonl({ level: "warn", ...i });
  } else {
    console.log(`Policy ${report.status}: coverage ${formatRatio(report.coverage_ratio)} (${report.certified}/${report.eligible})`);
    for (const v of report.violations) console.error(`${v.kind}: ${v.message}`);
    for (const id of res.orphaned) console.error(`orphaned registry entry: ${id}`);
    for (const i of res.issues) console.error(`${i.code}: ${i.message}`);
  }
  process.exit(res.exitCode);
});

withCommon(
  program
    .command("hook")
    .description("Pre-commit hook: annotate the given files, then fail on policy violations")
    .argument("[paths...]", "Files to inspect, usually the staged ones")
    .option("--ai-agent <name>", "Recorded as ai_composed on new annotations", "pending")
    .option("--no-block", "Report violations without failing the commit"),
).action(async (paths: string[], opts: GlobalOpts & { aiAgent: string; block: boolean }) => {
  const res = await hookCommand({ ...common(opts), paths, agent: opts.aiAgent, block: opts.block });
  if (!res.ok) fail(res, opts.format);

  if (opts.format === "jsonl") {
    for (const id of res.annotated) writeJsonl({ level: "info", code: "ANNOTATED", id });
    for (const v of res.report?.violations ?? []) writeJsonl({ level: "error", code: "VIOLATION", ...v });
    for (const i of res.issues) writeJsonl({ level: "warn", ...i });
  } else {
    if (res.annotated.length > 0) console.log(`Annotated ${res.annotated.length} artifact(s).`);
    for (const v of res.report?.violations ?? []) console.error(`${v.kind}: ${v.message}`);
    for (const i of res.issues) console.error(`${i.code}: ${i.message}`);
  }
  process.exit(res.exitCode);
});

withCommon(
  program
    .command("report")
    .description("Render the coverage report")
    .option("--report-format <format>", "text|json|md", "text"),
).action(async (opts: GlobalOpts & { reportFormat: string }) => {
  const res = await reportCommand({ ...common(opts), reportFormat: opts.reportFormat });
  if (!res.ok) fail(res, opts.format);
  process.stdout.write(res.output);
});

const config = program.command("config").description("Tool configuration");

config
  .command("show")
  .description("Print the merged configuration")
  .option("--config-dir <path>", "Tool config directory")
  .option("--env <name>", "Config override layer")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action((opts: { configDir?: string; env?: string; format: OutputFormat }) => {
    const res = configShow(opts);
    if (!res.ok) fail(res, opts.format);
    if (opts.format === "jsonl") writeJsonl(res.config);
    else console.log(JSON.stringify(res.config, null, 2));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.OPERATION_FAILED);
});
