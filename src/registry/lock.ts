import { mkdir, open, readFile, stat, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import { isErrnoException } from "../errors.js";
import { getLogger } from "../logging/logger.js";

const log = getLogger("lock");

export const STALE_LOCK_AGE_MS = 300_000;

export type LockOptions = {
  timeoutMs: number;
  staleMs?: number;
};

export type ReleaseLock = () => Promise<void>;

export class LockTimeoutError extends Error {
  constructor(
    readonly lockPath: string,
    readonly attempts: number,
  ) {
    super(`Timed out acquiring lock after ${attempts} attempts: ${lockPath}`);
    this.name = "LockTimeoutError";
  }
}

function isProcessAlive(pid: number): boolean {
  try {
    // Signal 0 only checks existence.
    process.kill(pid, 0);
    return true;
  } catch (e) {
    // EPERM: the process exists but belongs to someone else.
    return isErrnoException(e, "EPERM");
  }
}

/** Remove a lock left behind by a dead process or one older than `staleMs`. */
async function clearAbandonedLock(lockPath: string, staleMs: number): Promise<void> {
  let mtimeMs: number;
  try {
    mtimeMs = (await stat(lockPath)).mtimeMs;
  } catch (e) {
    if (isErrnoException(e, "ENOENT")) return;
    throw e;
  }

  const age = Date.now() - mtimeMs;
  if (age > staleMs) {
    log.warn({ lockPath, ageSeconds: Math.round(age / 1000) }, "removing stale lock");
    await unlink(lockPath).catch((e: unknown) => {
      if (!isErrnoException(e, "ENOENT")) throw e;
    });
    return;
  }

  const content = await readFile(lockPath, "utf8").catch(() => "");
  const owner = Number(content.split("\n")[0]);
  if (Number.isInteger(owner) && owner > 0 && owner !== process.pid && !isProcessAlive(owner)) {
    log.warn({ lockPath, pid: owner }, "removing orphaned lock");
    await unlink(lockPath).catch((e: unknown) => {
      if (!isErrnoException(e, "ENOENT")) throw e;
    });
  }
}

/**
 * Exclusive lock file holding `<pid>\n<epoch ms>`. Retries with capped
 * exponential backoff and jitter until `timeoutMs`, then throws LockTimeoutError.
 */
export async function acquireFsLock(lockPath: string, opts: LockOptions): Promise<ReleaseLock> {
  await mkdir(dirname(lockPath), { recursive: true });
  const staleMs = opts.staleMs ?? STALE_LOCK_AGE_MS;
  const started = Date.now();
  const pid = process.pid;
  let attempts = 0;

  for (;;) {
    attempts++;
    await clearAbandonedLock(lockPath, staleMs);
    try {
      const fh = await open(lockPath, "wx");
      try {
        await fh.writeFile(`${pid}\n${Date.now()}\n`, "utf8");
        await fh.sync();
      } finally {
        await fh.close();
      }
      log.debug({ lockPath, attempts }, "lock acquired");
      return async () => {
        let content: string;
        try {
          content = await readFile(lockPath, "utf8");
        } catch (e) {
          if (!isErrnoException(e, "ENOENT")) throw e;
          log.warn({ lockPath }, "lock was removed by another process before release");
          return;
        }
        const [lockPid] = content.split("\n");
        if (lockPid === String(pid)) {
          await unlink(lockPath).catch((e: unknown) => {
            if (!isErrnoException(e, "ENOENT")) throw e;
          });
        } else {
          log.warn({ lockPath, current: lockPid, ours: pid }, "lock was taken over by another process");
        }
      };
    } catch (e) {
      if (!isErrnoException(e, "EEXIST")) throw e;
    }

    const elapsed = Date.now() - started;
    if (elapsed >= opts.timeoutMs) throw new LockTimeoutError(lockPath, attempts);

    const backoff = Math.min(50 * Math.pow(1.5, attempts), 1000);
    const jitter = Math.random() * backoff * 0.1;
    await new Promise((r) => setTimeout(r, Math.min(backoff + jitter, opts.timeoutMs - elapsed)));
  }
}
