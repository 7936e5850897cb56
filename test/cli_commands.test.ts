import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { checkCommand, renderReport, reportCommand } from "../src/commands/check.js";
import { configShow } from "../src/commands/config.js";
import type { CommonOpts } from "../src/commands/context.js";
import { EXIT } from "../src/commands/exit-codes.js";
import { hookCommand } from "../src/commands/hook.js";
import {
  annotateCommand,
  certifyAgentCommand,
  certifyBatchCommand,
  certifyCommand,
  finalizeCommand,
} from "../src/commands/lifecycle.js";
import { reconcileCommand } from "../src/commands/reconcile.js";
import { scanCommand } from "../src/commands/scan.js";
import { StaticAttribution } from "../src/git/attribution.js";
import { evaluatePolicy } from "../src/policy/evaluator.js";
import { defaultPolicy } from "../src/policy/loader.js";
import { CART_SOURCE, makeTmpDir, metadata, readSource, record, steppingClock, writeSource } from "./fixtures.js";

const FILE = "src/cart.ts";
const ADD = `${FILE}::add`;
const UTIL = "src/util.ts";
const SLUG = `${UTIL}::slug`;
const UTIL_SOURCE = "export function slug(s: string): string {\n  return s.trim().toLowerCase();\n}\n";

describe("exit codes", () => {
  it("maps outcomes to stable codes", () => {
    expect(EXIT).toEqual({ SUCCESS: 0, POLICY_FAILED: 1, OPERATION_FAILED: 2, INVALID_ARGS: 3, REGISTRY_ERROR: 4 });
  });
});

describe("commands", () => {
  let root: string;
  let opts: CommonOpts;

  beforeEach(() => {
    root = makeTmpDir("cli");
    writeSource(root, FILE, CART_SOURCE);
    opts = { root, attribution: new StaticAttribution("last_commit=abc1234 by dev"), clock: steppingClock() };
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("scan lists artifacts with their stage", async () => {
    const res = await scanCommand(opts);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.artifacts.map((a) => [a.id, a.kind, a.line, a.stage])).toEqual([
      [ADD, "function", 2, "pristine"],
      [`${FILE}::Cart`, "class", 6, "pristine"],
      [`${FILE}::Cart.push`, "method", 9, "pristine"],
      [`${FILE}::Cart.total`, "method", 13, "pristine"],
    ]);
    expect(res.issues).toEqual([]);
  });

  it("scan reports files that do not parse", async () => {
    writeSource(root, "src/broken.ts", "export function (\n");
    const res = await scanCommand(opts);
    expect(res.ok && res.issues.map((i) => [i.file, i.code])).toEqual([["src/broken.ts", "PARSE_ERROR"]]);
  });

  it("annotate needs an id, --path or --all", async () => {
    const res = await annotateCommand({ ...opts, agent: "gpt-5" });
    expect(res).toEqual({
      ok: false,
      error: { code: "INVALID_ARGS", message: "an artifact id, --path or --all is required" },
      exitCode: EXIT.INVALID_ARGS,
    });
  });

  it("annotate rejects an id together with --path", async () => {
    const res = await annotateCommand({ ...opts, id: ADD, paths: [UTIL], agent: "gpt-5" });
    expect(res).toEqual({
      ok: false,
      error: { code: "INVALID_ARGS", message: "an artifact id cannot be combined with --path or --all" },
      exitCode: EXIT.INVALID_ARGS,
    });
  });

  it("annotate --path touches only the given files", async () => {
    writeSource(root, UTIL, UTIL_SOURCE);
    const res = await annotateCommand({ ...opts, paths: [UTIL], agent: "gpt-5" });
    expect(res.ok && res.annotated).toEqual([SLUG]);

    const scan = await scanCommand(opts);
    expect(scan.ok && scan.artifacts.filter((a) => a.stage !== "pristine").map((a) => a.id)).toEqual([SLUG]);
  });

  it("certify --path reviews pending artifacts under the path only", async () => {
    writeSource(root, UTIL, UTIL_SOURCE);
    await annotateCommand({ ...opts, all: true, agent: "gpt-5" });

    const res = await certifyBatchCommand({ ...opts, paths: ["src/util.ts"], reviewer: "dana" });
    expect(res).toEqual({ ok: true, certified: [SLUG], skipped: [] });
    expect(readSource(root, UTIL)).toMatch(/^scrutiny: medium$/m);

    const scan = await scanCommand(opts);
    expect(scan.ok && scan.artifacts.find((a) => a.id === ADD)?.stage).toBe("annotated");
  });

  it("certify --all-pending defaults to high scrutiny", async () => {
    writeSource(root, UTIL, UTIL_SOURCE);
    await annotateCommand({ ...opts, all: true, agent: "gpt-5" });

    const res = await certifyBatchCommand({ ...opts, allPending: true, reviewer: "dana" });
    expect(res.ok && [...res.certified].sort()).toEqual(
      [ADD, `${FILE}::Cart`, `${FILE}::Cart.push`, `${FILE}::Cart.total`, SLUG].sort(),
    );
    expect(readSource(root, UTIL)).toMatch(/^scrutiny: high$/m);

    const again = await certifyBatchCommand({ ...opts, allPending: true, reviewer: "dana" });
    expect(again).toEqual({ ok: true, certified: [], skipped: [] });
  });

  it("certify without an id needs --path or --all-pending", async () => {
    const res = await certifyBatchCommand({ ...opts, reviewer: "dana" });
    expect(res).toEqual({
      ok: false,
      error: { code: "INVALID_ARGS", message: "--path or --all-pending is required" },
      exitCode: EXIT.INVALID_ARGS,
    });
  });

  it("certify --all-pending refuses --include-existing", async () => {
    const res = await certifyBatchCommand({ ...opts, allPending: true, includeExisting: true, reviewer: "dana" });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.exitCode).toBe(EXIT.INVALID_ARGS);
  });

  it("hook annotates the staged files and blocks on violations", async () => {
    writeSource(root, UTIL, UTIL_SOURCE);
    fs.writeFileSync(path.join(root, ".provenant.yml"), "enforcement:\n  min_coverage: 1\n");

    const res = await hookCommand({ ...opts, paths: [UTIL], agent: "gpt-5" });
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.annotated).toEqual([SLUG]);
    expect(res.report?.violations.map((v) => v.kind)).toEqual(["ai_composed_requires_high_scrutiny", "min_coverage"]);
    expect(res.exitCode).toBe(EXIT.POLICY_FAILED);
    expect(readSource(root, UTIL)).toContain("notes: auto-tagged by the pre-commit hook");
  });

  it("hook with block off reports violations but lets the commit through", async () => {
    writeSource(root, UTIL, UTIL_SOURCE);
    fs.writeFileSync(path.join(root, ".provenant.yml"), "enforcement:\n  min_coverage: 1\n");

    const res = await hookCommand({ ...opts, paths: [UTIL], agent: "gpt-5", block: false });
    expect(res.ok && res.report?.status).toBe("fail");
    expect(res.ok && res.exitCode).toBe(EXIT.SUCCESS);
  });

  it("hook with no staged files does nothing", async () => {
    const res = await hookCommand({ ...opts, paths: [] });
    expect(res).toEqual({ ok: true, annotated: [], report: null, issues: [], exitCode: EXIT.SUCCESS });
    expect(readSource(root, FILE)).toBe(CART_SOURCE);
  });

  it("certify rejects an unknown scrutiny level", async () => {
    const res = await certifyCommand({ ...opts, id: ADD, reviewer: "dana", scrutiny: "extreme" });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.exitCode).toBe(EXIT.INVALID_ARGS);
  });

  it("certify defaults to medium scrutiny and accepts any case", async () => {
    await annotateCommand({ ...opts, id: ADD, agent: "gpt-5" });
    const res = await certifyCommand({ ...opts, id: ADD, reviewer: "dana" });
    expect(res.ok && res.metadata.scrutiny).toBe("medium");

    const again = await certifyCommand({ ...opts, id: ADD, reviewer: "dana", scrutiny: "HIGH", includeExisting: true });
    expect(again.ok && again.metadata.scrutiny).toBe("high");
  });

  it("certify-agent fails closed with exit code 2", async () => {
    await annotateCommand({ ...opts, id: ADD, agent: "gpt-5" });
    const before = readSource(root, FILE);
    const res = await certifyAgentCommand({ ...opts, id: ADD, agent: "bot-x" });
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.exitCode).toBe(EXIT.OPERATION_FAILED);
      expect(res.error.code).toBe("AGENT_PERMISSION");
    }
    expect(readSource(root, FILE)).toBe(before);
  });

  it("certify-agent works when the policy file enables the agent", async () => {
    fs.writeFileSync(
      path.join(root, ".provenant.yml"),
      "integrations:\n  agents:\n    enabled: true\n    reviewers:\n      - id: bot-x\n        max_scrutiny: medium\n",
    );
    await annotateCommand({ ...opts, id: ADD, agent: "gpt-5" });
    const res = await certifyAgentCommand({ ...opts, id: ADD, agent: "bot-x" });
    expect(res.ok && res.metadata.reviewers.map((r) => [r.kind, r.id, r.scrutiny])).toEqual([["agent", "bot-x", "medium"]]);
  });

  it("reports a named policy file that is missing as invalid arguments", async () => {
    const res = await scanCommand({ ...opts, policy: "strict.yml" });
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.exitCode).toBe(EXIT.INVALID_ARGS);
      expect(res.error.code).toBe("CONFIG_INVALID");
    }
  });

  it("runs the lifecycle end to end", async () => {
    await annotateCommand({ ...opts, all: true, agent: "gpt-5" });
    await certifyCommand({ ...opts, id: ADD, reviewer: "dana", scrutiny: "high" });

    const fin = await finalizeCommand({ ...opts, all: true });
    expect(fin.ok && fin.entries.map((e) => e.id)).toEqual([ADD]);
    expect(fs.existsSync(path.join(root, ".provenant", "registry.yaml"))).toBe(true);

    writeSource(root, FILE, readSource(root, FILE).replace("return a + b;", "return a * b;"));
    const rec = await reconcileCommand(opts);
    expect(rec.ok && rec.reopened.map((r) => r.id)).toEqual([ADD]);

    const scan = await scanCommand(opts);
    expect(scan.ok && scan.artifacts.find((a) => a.id === ADD)?.stage).toBe("under_review");
  });

  it("check exits 1 when the policy fails and 0 when it passes", async () => {
    fs.writeFileSync(path.join(root, ".provenant.yml"), "enforcement:\n  min_coverage: 0.5\n");
    const failing = await checkCommand(opts);
    expect(failing.ok).toBe(true);
    if (failing.ok) {
      expect(failing.exitCode).toBe(EXIT.POLICY_FAILED);
      expect(failing.report.violations.map((v) => v.kind)).toEqual(["min_coverage"]);
    }

    fs.writeFileSync(path.join(root, ".provenant.yml"), "enforcement:\n  ignore_unannotated: true\n  min_coverage: 0.5\n");
    const passing = await checkCommand(opts);
    expect(passing.ok && passing.exitCode).toBe(EXIT.SUCCESS);
  });

  it("check reconciles first unless told not to", async () => {
    await annotateCommand({ ...opts, id: ADD, agent: "gpt-5" });
    await certifyCommand({ ...opts, id: ADD, reviewer: "dana", scrutiny: "high" });
    await finalizeCommand({ ...opts, id: ADD });
    writeSource(root, FILE, readSource(root, FILE).replace("return a + b;", "return a + b + 1;"));

    const skipped = await checkCommand({ ...opts, reconcile: false });
    expect(skipped.ok && skipped.reopened).toEqual([]);

    const res = await checkCommand(opts);
    expect(res.ok && res.reopened).toEqual([ADD]);
  });

  it("reports registry corruption with exit code 4", async () => {
    writeSource(root, ".provenant/registry.yaml", "version: 1\nartifacts: [\n");
    const res = await checkCommand(opts);
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.exitCode).toBe(EXIT.REGISTRY_ERROR);
      expect(res.error.code).toBe("REGISTRY_CORRUPTION");
    }
  });

  it("renders a markdown report", async () => {
    await annotateCommand({ ...opts, id: ADD, agent: "gpt-5" });
    await certifyCommand({ ...opts, id: ADD, reviewer: "dana", scrutiny: "high" });
    const res = await reportCommand({ ...opts, reportFormat: "md" });
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.output).toBe(
      [
        "# Provenance report",
        "",
        "| metric | value |",
        "| --- | --- |",
        "| status | pass |",
        "| coverage | 25.0% (1/4) |",
        "| agent coverage | 0.0% |",
        "| finalized | 0 |",
        "| ai-composed, uncertified | 0 |",
        "",
        "## Pending",
        "",
        `- \`${FILE}::Cart\``,
        `- \`${FILE}::Cart.push\``,
        `- \`${FILE}::Cart.total\``,
        "",
      ].join("\n"),
    );
  });

  it("rejects an unknown report format", async () => {
    const res = await reportCommand({ ...opts, reportFormat: "pdf" });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.exitCode).toBe(EXIT.INVALID_ARGS);
  });
});

describe("renderReport", () => {
  const report = evaluatePolicy(
    [record("a.ts::a", metadata({ ai_composed: "gpt-5", human_certified: "dana", scrutiny: "low" }))],
    defaultPolicy(),
  );

  it("renders text", () => {
    expect(renderReport(report, "text")).toBe(
      [
        "status: fail",
        "coverage: 100.0% (1/1)",
        "agent coverage: 0.0%",
        "finalized: 0, ai-composed uncertified: 0",
        "violation ai_composed_requires_high_scrutiny: a.ts::a was composed by gpt-5 and has scrutiny low; high is required",
        "",
      ].join("\n"),
    );
  });

  it("renders json", () => {
    expect(JSON.parse(renderReport(report, "json"))).toEqual(report);
  });
});

describe("config show", () => {
  it("returns the merged configuration", () => {
    const res = configShow({ env: "ci" });
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.config.lock_timeout_ms).toBe(30000);
    expect(res.config.registry_dir).toBe(".provenant");
  });

  it("fails on a config directory with an invalid base layer", () => {
    const dir = makeTmpDir("cfg");
    try {
      fs.writeFileSync(path.join(dir, "base.yaml"), "registry_dir: .provenant\n");
      const res = configShow({ configDir: dir });
      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.exitCode).toBe(EXIT.INVALID_ARGS);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
