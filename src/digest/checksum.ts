import { createHash } from "node:crypto";

/** SHA-256 hex of a string or buffer. */
export function sha256Hex(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/** First `length` hex characters, for log lines and history events. */
export function shortDigest(digest: string, length = 12): string {
  return digest.slice(0, length);
}
