import { simpleGit, type SimpleGit } from "simple-git";
import { errorMessage } from "../errors.js";
import { getLogger } from "../logging/logger.js";

const log = getLogger("git");

/** Source-control context recorded in history when an artifact is annotated. */
export interface AttributionSource {
  /** e.g. `last_commit=abc1234 by Dana`, or null when unknown. */
  describe(file: string, line: number): Promise<string | null>;
}

export const UNKNOWN_ATTRIBUTION = "last_commit=unknown";

export type BlameLine = {
  sha: string;
  author: string | null;
};

const UNCOMMITTED = /^0+$/;

/** Parse the first hunk of `git blame --porcelain` output. */
export function parseBlamePorcelain(output: string): BlameLine | null {
  const lines = output.split("\n");
  const header = /^([0-9a-f]{40}) \d+ \d+/.exec(lines[0] ?? "");
  if (!header) return null;

  let author: string | null = null;
  for (const line of lines.slice(1)) {
    if (line.startsWith("\t")) break;
    if (line.startsWith("author ")) author = line.slice("author ".length).trim();
  }
  return { sha: header[1], author };
}

/** Blame-based attribution through simple-git. Any git failure yields null. */
export class GitAttribution implements AttributionSource {
  private git: SimpleGit;

  constructor(repoPath: string, git?: SimpleGit) {
    this.git = git ?? simpleGit(repoPath);
  }

  async describe(file: string, line: number): Promise<string | null> {
    let output: string;
    try {
      output = await this.git.raw(["blame", "--porcelain", "-L", `${line},${line}`, "--", file]);
    } catch (e) {
      log.debug({ file, line, err: errorMessage(e) }, "git blame unavailable");
      return null;
    }

    const blame = parseBlamePorcelain(output);
    if (!blame || UNCOMMITTED.test(blame.sha)) return null;
    const short = blame.sha.slice(0, 7);
    return blame.author ? `last_commit=${short} by ${blame.author}` : `last_commit=${short}`;
  }
}

/** Attribution that always reports the same text. */
export class StaticAttribution implements AttributionSource {
  constructor(private readonly text: string | null = UNKNOWN_ATTRIBUTION) {}

  async describe(): Promise<string | null> {
    return this.text;
  }
}
