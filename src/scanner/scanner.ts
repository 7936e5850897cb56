import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { minimatch } from "minimatch";
import type { AnnotationCodec } from "../annotation/codec.js";
import { ConfigError } from "../errors.js";
import { getLogger } from "../logging/logger.js";
import type { ScanResult } from "../types/artifact.js";
import { scanSource, toPosixRelative } from "./source-file.js";

const log = getLogger("scanner");

/** Directories never descended into, whatever the globs say. */
const ALWAYS_SKIPPED = new Set([".git", "node_modules"]);

export type ScanOptions = {
  include: string[];
  exclude: string[];
  codec: AnnotationCodec;
  /** Files or directories (see resolveScopes) to restrict the scan to. Empty or absent: everything. */
  scopes?: readonly string[];
};

/**
 * Turn user-supplied files or directories into posix prefixes relative to
 * `root`. The root itself becomes "", which matches every file.
 */
export function resolveScopes(root: string, paths: readonly string[]): string[] {
  return paths.map((p) => {
    const rel = toPosixRelative(root, path.resolve(root, p));
    if (rel === ".." || rel.startsWith("../") || path.isAbsolute(rel)) {
      throw new ConfigError(p, "path is outside the repository");
    }
    return rel;
  });
}

export function inScopes(file: string, scopes: readonly string[]): boolean {
  return scopes.length === 0 || scopes.some((s) => s === "" || file === s || file.startsWith(`${s}/`));
}

function matchesAny(rel: string, patterns: readonly string[]): boolean {
  return patterns.some((p) => minimatch(rel, p));
}

/** Files under `root` matching `include` and not `exclude`, as sorted posix relative paths. */
export async function listSourceFiles(root: string, include: string[], exclude: string[]): Promise<string[]> {
  const out: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const abs = path.join(dir, entry.name);
      const rel = toPosixRelative(root, abs);
      if (entry.isDirectory()) {
        if (ALWAYS_SKIPPED.has(entry.name) || matchesAny(`${rel}/`, exclude)) continue;
        await walk(abs);
      } else if (entry.isFile() && matchesAny(rel, include) && !matchesAny(rel, exclude)) {
        out.push(rel);
      }
    }
  };

  await walk(root);
  return out.sort();
}

/** Scan one project-relative file. */
export async function scanFile(root: string, file: string, codec: AnnotationCodec): Promise<ScanResult> {
  const text = await readFile(path.join(root, file), "utf8");
  return scanSource(file, text, codec);
}

/**
 * Scan every matching file. Files are independent, so they are read and parsed
 * concurrently; results come back ordered by file, then position.
 */
export async function scan(root: string, opts: ScanOptions): Promise<ScanResult> {
  const scopes = opts.scopes ?? [];
  const files = (await listSourceFiles(root, opts.include, opts.exclude)).filter((f) => inScopes(f, scopes));
  const perFile = await Promise.all(files.map((f) => scanFile(root, f, opts.codec)));

  const result: ScanResult = { records: [], errors: [] };
  for (const part of perFile) {
    result.records.push(...part.records);
    result.errors.push(...part.errors);
  }
  log.debug({ files: files.length, artifacts: result.records.length, errors: result.errors.length }, "scan complete");
  return result;
}
