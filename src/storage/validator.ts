import { lookup } from "mime-types";
import { ValidationError } from "./errors.js";

/**
 * What the validator may accept. Built once from configuration.
 */
export interface MediaTypePolicy {
  max_size_bytes: number;
  allowed_media_types: ReadonlySet<string>; // non-empty, lowercase
  infer: (filename: string) => string | undefined;
}

/**
 * Everything known about an upload before its bytes are read.
 * `source` is only checked for presence, never consumed.
 */
export interface UploadCandidate<S> {
  source?: S | null;
  original_name?: string | null;
  declared_size?: number | null;
  declared_type?: string | null;
}

export interface ValidatedUpload<S> {
  source: S;
  original_name: string;
  media_type: string;
}

/** Extension-based lookup via the mime-types database. */
export function inferMediaType(filename: string): string | undefined {
  const type = lookup(filename);
  return type === false ? undefined : type;
}

export function createMediaTypePolicy(opts: {
  max_size_bytes: number;
  allowed_media_types: readonly string[];
  infer?: (filename: string) => string | undefined;
}): MediaTypePolicy {
  return {
    max_size_bytes: opts.max_size_bytes,
    allowed_media_types: new Set(
      opts.allowed_media_types.map((t) => normalizeMediaType(t)),
    ),
    infer: opts.infer ?? inferMediaType,
  };
}

/**
 * Comparable form of a Content-Type value.
 * - " Audio/MPEG; charset=binary" → "audio/mpeg"
 */
export function normalizeMediaType(value: string): string {
  return (value.split(";")[0] ?? "").trim().toLowerCase();
}

/**
 * Effective media type, in order of precedence:
 * 1. declared type, if allowed
 * 2. type inferred from the file name, if allowed
 * Returns undefined when neither qualifies.
 */
export function resolveMediaType(
  declaredType: string | null | undefined,
  filename: string,
  policy: MediaTypePolicy,
): string | undefined {
  if (declaredType) {
    const declared = normalizeMediaType(declaredType);
    if (policy.allowed_media_types.has(declared)) return declared;
  }
  const inferred = policy.infer(filename);
  if (inferred !== undefined) {
    const normalized = normalizeMediaType(inferred);
    if (policy.allowed_media_types.has(normalized)) return normalized;
  }
  return undefined;
}

function formatMiB(bytes: number): string {
  const mib = bytes / (1024 * 1024);
  return Number.isInteger(mib) ? `${mib}MB` : `${bytes} bytes`;
}

/**
 * Gate an upload on what the caller already knows.
 *
 * @throws ValidationError MISSING_FILE | TOO_LARGE | UNSUPPORTED_TYPE
 */
export function validateUpload<S>(
  candidate: UploadCandidate<S>,
  policy: MediaTypePolicy,
): ValidatedUpload<S> {
  const source = candidate.source;
  const name = candidate.original_name?.trim();
  if (source === undefined || source === null || !name) {
    throw new ValidationError("MISSING_FILE", "No file provided");
  }

  const declaredSize = candidate.declared_size;
  if (
    typeof declaredSize === "number" &&
    declaredSize > policy.max_size_bytes
  ) {
    throw new ValidationError(
      "TOO_LARGE",
      `File too large (max ${formatMiB(policy.max_size_bytes)})`,
      { max_size_bytes: policy.max_size_bytes },
    );
  }

  const mediaType = resolveMediaType(
    candidate.declared_type,
    candidate.original_name ?? name,
    policy,
  );
  if (mediaType === undefined) {
    const allowed = [...policy.allowed_media_types].sort();
    throw new ValidationError(
      "UNSUPPORTED_TYPE",
      `Unsupported file type. Supported types: ${allowed.join(", ")}`,
      { allowed_media_types: allowed },
    );
  }

  return {
    source,
    original_name: candidate.original_name ?? name,
    media_type: mediaType,
  };
}
