export type ErrorCode =
  | "PARSE_ERROR"
  | "ANNOTATION_CORRUPTION"
  | "AGENT_PERMISSION"
  | "LIFECYCLE"
  | "REGISTRY_CORRUPTION"
  | "REOPEN_CONFLICT"
  | "ARTIFACT_NOT_FOUND"
  | "CONFIG_INVALID";

/** Base class for every error the engine reports to its callers. */
export class ProvenanceError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Source could not be parsed; the file is skipped and the batch continues. */
export class ParseError extends ProvenanceError {
  constructor(
    readonly file: string,
    readonly detail: string,
    readonly line: number | null = null,
  ) {
    super("PARSE_ERROR", `${file}${line === null ? "" : `:${line}`}: ${detail}`);
  }
}

/** Inline annotation payload is malformed. Surfaced per artifact. */
export class AnnotationCorruption extends ProvenanceError {
  constructor(
    readonly artifactId: string | null,
    readonly reason: string,
  ) {
    super("ANNOTATION_CORRUPTION", artifactId ? `${artifactId}: ${reason}` : reason);
  }
}

export class AgentPermissionError extends ProvenanceError {
  constructor(
    readonly agentId: string,
    readonly reason: string,
  ) {
    super("AGENT_PERMISSION", reason);
  }
}

/** A transition was requested from a stage that does not allow it. */
export class LifecycleError extends ProvenanceError {
  constructor(
    readonly artifactId: string,
    readonly reason: string,
  ) {
    super("LIFECYCLE", `${artifactId}: ${reason}`);
  }
}

/** Registry file is malformed or its lock cannot be obtained. Never auto-repaired. */
export class RegistryCorruption extends ProvenanceError {
  constructor(
    readonly path: string,
    readonly reason: string,
  ) {
    super("REGISTRY_CORRUPTION", `Registry ${path}: ${reason}`);
  }
}

/** Registry entry whose artifact is absent from the current scan. */
export class ReopenConflict extends ProvenanceError {
  constructor(
    readonly artifactId: string,
    readonly digest: string,
  ) {
    super("REOPEN_CONFLICT", `Registry entry ${artifactId} has no matching artifact in the current scan`);
  }
}

export class ArtifactNotFound extends ProvenanceError {
  constructor(readonly ref: string) {
    super("ARTIFACT_NOT_FOUND", `Artifact not found: ${ref}`);
  }
}

export class ConfigError extends ProvenanceError {
  constructor(
    readonly path: string,
    readonly reason: string,
  ) {
    super("CONFIG_INVALID", `${path}: ${reason}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Narrow a thrown value to a Node.js system error with the given code. */
export function isErrnoException(err: unknown, code?: string): err is NodeJS.ErrnoException {
  if (!(err instanceof Error) || !("code" in err)) return false;
  return code === undefined || err.code === code;
}
