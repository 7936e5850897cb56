import { mkdir, open, rename, unlink, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import { getLogger } from "../logging/logger.js";

const log = getLogger("fs");

/**
 * Write to a sibling temp file, fsync, then rename over the target. A reader
 * sees either the old complete file or the new one.
 */
export async function atomicWriteFile(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp.${process.pid}.${Date.now()}`;

  let fh: FileHandle | null = null;
  try {
    fh = await open(tmp, "w");
    await fh.writeFile(content, "utf8");
    await fh.sync();
    await fh.close();
    fh = null;

    await rename(tmp, path);
  } catch (e) {
    if (fh) await fh.close().catch((closeErr: unknown) => log.warn({ err: closeErr, tmp }, "failed to close temp file"));
    await unlink(tmp).catch((unlinkErr: unknown) => log.debug({ err: unlinkErr, tmp }, "temp file already gone"));
    throw e;
  }
}
