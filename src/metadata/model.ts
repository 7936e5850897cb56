import { AnnotationCorruption } from "../errors.js";
import { defaultSchemas } from "../schema/registry.js";
import {
  SCRUTINY_LEVELS,
  type MetadataPayload,
  type ReviewerInfo,
  type Scrutiny,
  type TagMetadata,
} from "../types/metadata.js";

export const PENDING = "pending";

/** Keys with a typed home in TagMetadata; everything else is an extra. */
const KNOWN_KEYS = new Set([
  "ai_composed",
  "human_certified",
  "scrutiny",
  "date",
  "notes",
  "history",
  "reviewers",
  "done",
  "reopened_at",
]);

export function emptyMetadata(): TagMetadata {
  return {
    ai_composed: PENDING,
    human_certified: PENDING,
    scrutiny: "auto",
    date: null,
    notes: null,
    history: [],
    reviewers: [],
    done: false,
    reopened_at: null,
    extras: {},
  };
}

export function isScrutiny(value: unknown): value is Scrutiny {
  return typeof value === "string" && (SCRUTINY_LEVELS as readonly string[]).includes(value);
}

/** Case-insensitive; returns null for anything outside the scale. */
export function parseScrutiny(value: unknown): Scrutiny | null {
  if (typeof value !== "string") return null;
  const lowered = value.trim().toLowerCase();
  return isScrutiny(lowered) ? lowered : null;
}

/** Negative when `a` is below `b` on the auto < low < medium < high scale. */
export function compareScrutiny(a: Scrutiny, b: Scrutiny): number {
  return SCRUTINY_LEVELS.indexOf(a) - SCRUTINY_LEVELS.indexOf(b);
}

export function scrutinyWithin(requested: Scrutiny, max: Scrutiny): boolean {
  return compareScrutiny(requested, max) <= 0;
}

export function isPending(value: string): boolean {
  const v = value.trim().toLowerCase();
  return v === "" || v === PENDING;
}

export function isPendingCertification(m: TagMetadata): boolean {
  return isPending(m.human_certified);
}

export function isAiComposed(m: TagMetadata): boolean {
  return !isPending(m.ai_composed);
}

/** True once anything beyond the defaults has been recorded. */
export function hasMetadata(m: TagMetadata): boolean {
  return (
    isAiComposed(m) ||
    !isPendingCertification(m) ||
    m.scrutiny !== "auto" ||
    m.date !== null ||
    m.notes !== null ||
    m.history.length > 0 ||
    m.reviewers.length > 0 ||
    m.done ||
    Object.keys(m.extras).length > 0
  );
}

export function cloneMetadata(m: TagMetadata): TagMetadata {
  return {
    ...m,
    history: [...m.history],
    reviewers: m.reviewers.map((r) => ({ ...r })),
    extras: structuredClone(m.extras),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(payload: MetadataPayload, key: string): string | null {
  const value = payload[key];
  return typeof value === "string" ? value : null;
}

function readScrutiny(artifactId: string | null, value: unknown, where: string): Scrutiny {
  if (value === undefined) return "auto";
  const parsed = parseScrutiny(value);
  if (!parsed) {
    throw new AnnotationCorruption(artifactId, `${where}: unknown scrutiny ${JSON.stringify(value)}`);
  }
  return parsed;
}

function readReviewer(artifactId: string | null, raw: Record<string, unknown>, index: number): ReviewerInfo {
  const kind = raw.kind === "agent" ? "agent" : "human";
  return {
    kind,
    id: String(raw.id),
    scrutiny: readScrutiny(artifactId, raw.scrutiny, `reviewers[${index}]`),
    timestamp: String(raw.timestamp),
    notes: typeof raw.notes === "string" ? raw.notes : null,
  };
}

/**
 * Build a TagMetadata from a decoded inline payload or a registry snapshot.
 * Missing keys take their defaults; unknown keys are kept in `extras` in the
 * order they appeared.
 */
export function metadataFromPayload(artifactId: string | null, payload: unknown): TagMetadata {
  if (!isRecord(payload)) {
    throw new AnnotationCorruption(artifactId, "annotation payload is not a mapping");
  }

  const check = defaultSchemas().validate("annotation", payload, "annotation");
  if (!check.valid) {
    throw new AnnotationCorruption(artifactId, check.errors ?? "annotation payload is invalid");
  }

  const extras: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (!KNOWN_KEYS.has(key)) extras[key] = value;
  }

  const reviewers = Array.isArray(payload.reviewers) ? payload.reviewers : [];
  const history = Array.isArray(payload.history) ? payload.history : [];

  return {
    ai_composed: optionalString(payload, "ai_composed") ?? PENDING,
    human_certified: optionalString(payload, "human_certified") ?? PENDING,
    scrutiny: readScrutiny(artifactId, payload.scrutiny, "scrutiny"),
    date: optionalString(payload, "date"),
    notes: optionalString(payload, "notes"),
    history: history.map(String),
    reviewers: reviewers.filter(isRecord).map((r, i) => readReviewer(artifactId, r, i)),
    done: payload.done === true,
    reopened_at: optionalString(payload, "reopened_at"),
    extras: structuredClone(extras),
  };
}

/** Ordered plain form: typed keys in a fixed order, then extras. */
export function metadataToPayload(m: TagMetadata): MetadataPayload {
  const payload: MetadataPayload = {
    ai_composed: m.ai_composed,
    human_certified: m.human_certified,
    scrutiny: m.scrutiny,
    date: m.date,
    notes: m.notes,
    history: [...m.history],
    reviewers: m.reviewers.map((r) => ({
      kind: r.kind,
      id: r.id,
      scrutiny: r.scrutiny,
      timestamp: r.timestamp,
      notes: r.notes,
    })),
    done: m.done,
  };
  if (m.reopened_at !== null) payload.reopened_at = m.reopened_at;
  for (const [key, value] of Object.entries(m.extras)) {
    payload[key] = structuredClone(value);
  }
  return payload;
}

/** What stays inline while the full record lives in the registry. */
export function finalizedProjection(m: TagMetadata): MetadataPayload {
  const payload: MetadataPayload = { done: true, human_certified: m.human_certified };
  for (const [key, value] of Object.entries(m.extras)) {
    payload[key] = structuredClone(value);
  }
  return payload;
}
