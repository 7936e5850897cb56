import fs from "node:fs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { defaultCodec } from "../src/annotation/codec.js";
import { AnnotationCorruption, ParseError } from "../src/errors.js";
import { listSourceFiles, scan } from "../src/scanner/scanner.js";
import { scanSource } from "../src/scanner/source-file.js";
import { BASE_CONFIG, makeTmpDir, writeSource } from "./fixtures.js";

const { include, exclude } = BASE_CONFIG;

const SAMPLE = `export function top(a: number): number {
  function inner() { return 1; }
  return a + inner();
}

export class Cart {
  constructor(private items: number[]) {}
  get size(): number { return this.items.length; }
  total(): number { return this.items.reduce((s, x) => s + x, 0); }
}

export const double = (n: number) => n * 2;

namespace Util {
  export function helper() {}
}

declare function ambient(): void;
`;

describe("scanSource", () => {
  it("finds functions, classes, methods and arrow functions with dotted names", () => {
    const { records, errors } = scanSource("src/a.ts", SAMPLE, defaultCodec);
    expect(errors).toEqual([]);
    expect(records.map((r) => r.artifact.id)).toEqual([
      "src/a.ts::top",
      "src/a.ts::top.inner",
      "src/a.ts::Cart",
      "src/a.ts::Cart.constructor",
      "src/a.ts::Cart.size:get",
      "src/a.ts::Cart.total",
      "src/a.ts::double",
      "src/a.ts::Util.helper",
    ]);
    expect(records.map((r) => r.artifact.kind)).toEqual([
      "function",
      "function",
      "class",
      "method",
      "method",
      "method",
      "arrow_function",
      "function",
    ]);
    expect(records.every((r) => r.metadata === null)).toBe(true);
  });

  it("records spans and the declaration indent", () => {
    const { records } = scanSource("src/a.ts", SAMPLE, defaultCodec);
    const top = records[0].artifact;
    expect(top.span.line).toBe(1);
    expect(top.span.endLine).toBe(4);
    expect(top.insertAt).toBe(0);
    const total = records.find((r) => r.artifact.qualifiedName === "Cart.total")?.artifact;
    expect(total?.indent).toBe("  ");
    expect(total?.span.line).toBe(9);
  });

  it("reads a provenance block placed under a doc comment", () => {
    const block = "/* @provenance\nai_composed: gpt-5\nscrutiny: auto\nextra_key: kept\n*/";
    const text = `/** Docs. */\n${block}\nexport function f() {}\n`;
    const { records } = scanSource("src/f.ts", text, defaultCodec);
    const [rec] = records;
    expect(rec.metadata?.ai_composed).toBe("gpt-5");
    expect(rec.metadata?.extras).toEqual({ extra_key: "kept" });
    expect(rec.artifact.annotation?.text).toBe(block);
    expect(rec.artifact.annotation?.start).toBe(13);
    expect(text.slice(rec.artifact.annotation?.start, rec.artifact.annotation?.end)).toBe(`${block}\n`);
  });

  it("gives the same digest with and without an annotation", () => {
    const plain = scanSource("src/f.ts", "export function f() { return 1; }\n", defaultCodec);
    const annotated = scanSource(
      "src/f.ts",
      "/* @provenance\nai_composed: gpt-5\n*/\nexport function f() { return 1; }\n",
      defaultCodec,
    );
    expect(annotated.records[0].artifact.digest).toBe(plain.records[0].artifact.digest);
  });

  it("marks a declaration that shares its line with other code", () => {
    const { records } = scanSource("src/s.ts", "const a = 1; function f() {}\n", defaultCodec);
    const [f] = records;
    expect(f.artifact.sharesLine).toBe(true);
    expect(f.artifact.insertAt).toBe(13);
    expect(f.artifact.indent).toBe("");
  });

  it("numbers repeated names in source order", () => {
    const text = "if (flag) {\n  function dup() {}\n} else {\n  function dup() {}\n}\nfunction dup() {}\n";
    const { records } = scanSource("src/d.ts", text, defaultCodec);
    expect(records.map((r) => r.artifact.id)).toEqual(["src/d.ts::dup", "src/d.ts::dup#2", "src/d.ts::dup#3"]);
  });

  it("keeps a repeated name's identity when lines are inserted above it", () => {
    const text = "if (flag) {\n  function dup() {}\n} else {\n  function dup() { return 2; }\n}\n";
    const shifted = `// header\n\n${text}`;
    const before = scanSource("src/d.ts", text, defaultCodec).records[1].artifact;
    const after = scanSource("src/d.ts", shifted, defaultCodec).records[1].artifact;
    expect(after.id).toBe("src/d.ts::dup#2");
    expect(after.id).toBe(before.id);
    expect(after.digest).toBe(before.digest);
  });

  it("skips a file with a syntax error and reports it", () => {
    const { records, errors } = scanSource("src/bad.ts", "function (\n", defaultCodec);
    expect(records).toEqual([]);
    expect(errors).toHaveLength(1);
    expect(errors[0].artifactId).toBeNull();
    expect(errors[0].error).toBeInstanceOf(ParseError);
  });

  it("reports a corrupt annotation for its artifact only", () => {
    const text = "/* @provenance\nscrutiny: extreme\n*/\nfunction g() {}\nfunction h() {}\n";
    const { records, errors } = scanSource("src/c.ts", text, defaultCodec);
    expect(records.map((r) => r.artifact.id)).toEqual(["src/c.ts::h"]);
    expect(errors).toHaveLength(1);
    expect(errors[0].artifactId).toBe("src/c.ts::g");
    expect(errors[0].error).toBeInstanceOf(AnnotationCorruption);
  });
});

describe("scan", () => {
  let root: string;

  beforeEach(() => {
    root = makeTmpDir("scan");
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("lists matching sources and skips excluded ones", async () => {
    writeSource(root, "src/a.ts", "export function a() {}\n");
    writeSource(root, "src/b.tsx", "export function B() { return <div />; }\n");
    writeSource(root, "src/types.d.ts", "export declare function t(): void;\n");
    writeSource(root, "dist/out.ts", "export function o() {}\n");
    writeSource(root, "node_modules/pkg/index.ts", "export function p() {}\n");
    writeSource(root, "coverage/lcov-report/x.ts", "export function x() {}\n");
    writeSource(root, "README.md", "# readme\n");

    expect(await listSourceFiles(root, include, exclude)).toEqual(["src/a.ts", "src/b.tsx"]);
  });

  it("collects records across files and keeps going past a broken one", async () => {
    writeSource(root, "src/a.ts", "export function a() {}\n");
    writeSource(root, "src/broken.ts", "export function (\n");
    writeSource(root, "src/c.ts", "export const c = () => 1;\n");

    const result = await scan(root, { include, exclude, codec: defaultCodec });
    expect(result.records.map((r) => r.artifact.id)).toEqual(["src/a.ts::a", "src/c.ts::c"]);
    expect(result.errors.map((e) => e.file)).toEqual(["src/broken.ts"]);
  });
});
