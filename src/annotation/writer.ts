import { readFile } from "node:fs/promises";
import path from "node:path";
import { atomicWriteFile } from "../fs/atomic.js";
import { getLogger } from "../logging/logger.js";
import type { Artifact } from "../types/artifact.js";
import type { MetadataPayload } from "../types/metadata.js";
import type { AnnotationCodec } from "./codec.js";
import { applyEdits, type TextEdit } from "./edits.js";

const log = getLogger("annotation");

export type AnnotationUpdate = {
  artifact: Artifact;
  payload: MetadataPayload;
};

/** Edit that writes `payload` as the artifact's annotation, replacing any existing block. */
export function annotationEdit(artifact: Artifact, payload: MetadataPayload, codec: AnnotationCodec): TextEdit {
  const block = artifact.annotation;
  if (block) {
    // A block that shares its line with other code is replaced in place, without re-indenting.
    const text = block.wholeLine ? codec.encode(payload, artifact.indent) : codec.encode(payload, "").trimEnd();
    return { start: block.start, end: block.end, text };
  }
  const text = codec.encode(payload, artifact.indent);
  return { start: artifact.insertAt, end: artifact.insertAt, text: artifact.sharesLine ? `\n${text}` : text };
}

/**
 * Rewrite annotations in one or more files. All updates for a file are applied
 * to one read of it and written back atomically.
 */
export async function writeAnnotations(root: string, updates: readonly AnnotationUpdate[], codec: AnnotationCodec): Promise<void> {
  const byFile = new Map<string, AnnotationUpdate[]>();
  for (const u of updates) {
    const list = byFile.get(u.artifact.file) ?? [];
    list.push(u);
    byFile.set(u.artifact.file, list);
  }

  for (const [file, list] of byFile) {
    const abs = path.join(root, file);
    const source = await readFile(abs, "utf8");
    const edits = list.map((u) => annotationEdit(u.artifact, u.payload, codec));
    await atomicWriteFile(abs, applyEdits(source, edits));
    log.debug({ file, annotations: list.length }, "annotations written");
  }
}
