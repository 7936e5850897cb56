import YAML from "yaml";
import { AnnotationCorruption } from "../errors.js";
import type { MetadataPayload } from "../types/metadata.js";

/**
 * Serializer for the structured record attached above a declaration.
 * Lifecycle code only ever sees payloads; the comment syntax lives here.
 */
export interface AnnotationCodec {
  readonly marker: string;
  /** True when a comment's text is one of this codec's blocks. */
  isAnnotation(commentText: string): boolean;
  /** Full block text including the trailing newline, each line prefixed with `indent`. */
  encode(payload: MetadataPayload, indent: string): string;
  /** null for a comment that is not an annotation. */
  decode(commentText: string): MetadataPayload | null;
}

const MARKER = "@provenance";
const OPEN = `/* ${MARKER}`;
const HEADER = /^\/\*\s*@provenance[ \t]*(?:\r?\n|$)/;
const TERMINATOR = /\*\//g;

/**
 * YAML for the block body. Strings holding `*\/` are double-quoted and the
 * slash escaped, so the body never ends the comment early.
 */
function stringifyBody(payload: MetadataPayload): string {
  const doc = new YAML.Document(payload);
  let escaped = false;
  YAML.visit(doc, {
    Scalar(_key, node) {
      if (typeof node.value === "string" && node.value.includes("*/")) {
        node.type = YAML.Scalar.QUOTE_DOUBLE;
        escaped = true;
      }
    },
  });
  const body = doc.toString({ lineWidth: 0 });
  // Every `*/` now sits inside a double-quoted scalar, where `\/` decodes to `/`.
  return escaped ? body.replace(TERMINATOR, "*\\/") : body;
}

/** `/* @provenance` followed by one YAML key per line and a closing `*\/`. */
export class YamlBlockCodec implements AnnotationCodec {
  readonly marker = MARKER;

  isAnnotation(commentText: string): boolean {
    return HEADER.test(commentText);
  }

  encode(payload: MetadataPayload, indent: string): string {
    const body = stringifyBody(payload);
    const lines = body.replace(/\n$/, "").split("\n");
    return [`${indent}${OPEN}`, ...lines.map((l) => `${indent}${l}`), `${indent}*/`].join("\n") + "\n";
  }

  decode(commentText: string): MetadataPayload | null {
    const header = HEADER.exec(commentText);
    if (!header) return null;
    if (!commentText.endsWith("*/")) {
      throw new AnnotationCorruption(null, "annotation block is not terminated");
    }

    const inner = commentText.slice(header[0].length, -2);
    const lines = inner.split(/\r?\n/);
    // The closing line carries only the declaration's indentation.
    const closing = lines.pop() ?? "";
    const indent = /^[ \t]*$/.test(closing) ? closing : "";
    const body = lines.map((l) => (l.startsWith(indent) ? l.slice(indent.length) : l)).join("\n");

    let parsed: unknown;
    try {
      parsed = YAML.parse(body);
    } catch (e) {
      throw new AnnotationCorruption(null, `annotation is not valid YAML: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (parsed === null || parsed === undefined) return {};
    if (typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new AnnotationCorruption(null, "annotation body is not a mapping");
    }
    return { ...parsed };
  }
}

export const defaultCodec: AnnotationCodec = new YamlBlockCodec();
