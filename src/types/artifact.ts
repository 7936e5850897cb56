import type { TagMetadata } from "./metadata.js";
import type { AnnotationCorruption, ParseError } from "../errors.js";

export type ArtifactKind = "function" | "class" | "method" | "arrow_function";

export type SourceSpan = {
  /** Offset of the declaration's first token (decorators included). */
  start: number;
  end: number;
  /** 1-based. */
  line: number;
  endLine: number;
};

/** Provenance comment currently attached to a declaration. */
export type AnnotationBlock = {
  start: number;
  end: number;
  text: string;
  /** The block sits alone on its lines and `start..end` covers them whole. */
  wholeLine: boolean;
};

/**
 * A function- or class-level unit discovered by one scan of one source revision.
 * A new scan produces new instances even for unchanged code.
 */
export type Artifact = {
  readonly id: string;
  readonly file: string;
  readonly qualifiedName: string;
  readonly kind: ArtifactKind;
  readonly span: SourceSpan;
  /** Where a new annotation block is inserted. */
  readonly insertAt: number;
  /** True when other code precedes the declaration on its first line. */
  readonly sharesLine: boolean;
  readonly indent: string;
  readonly annotation: AnnotationBlock | null;
  readonly digest: string;
};

export type ArtifactRecord = {
  artifact: Artifact;
  /** null while the artifact is pristine. */
  metadata: TagMetadata | null;
};

export type ScanIssue = {
  file: string;
  artifactId: string | null;
  error: ParseError | AnnotationCorruption;
};

export type ScanResult = {
  records: ArtifactRecord[];
  errors: ScanIssue[];
};
