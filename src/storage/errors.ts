/**
 * Error codes for upload validation. Raised before any bytes are stored,
 * except TOO_LARGE, which the streaming writer also raises mid-transfer.
 */
export type ValidationErrorCode =
  | "MISSING_FILE" // no source or no file name
  | "MISSING_OWNER" // owner id empty after trimming
  | "TOO_LARGE" // declared or measured size exceeds max_size_bytes
  | "UNSUPPORTED_TYPE"; // neither declared nor inferred type is allowed

export class ValidationError extends Error {
  constructor(
    public readonly code: ValidationErrorCode,
    message: string,
    public readonly details?: {
      max_size_bytes?: number;
      bytes_received?: number;
      allowed_media_types?: string[];
    },
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

export type StorageErrorCode = "WRITE_FAILED"; // partial blob already removed

export class StorageError extends Error {
  constructor(
    public readonly code: StorageErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StorageError";
  }
}

export type ArchiveErrorCode =
  | "EMPTY_ARCHIVE" // no blob of the owner could be located
  | "BUILD_FAILED"; // partial artifact already removed

export class ArchiveError extends Error {
  constructor(
    public readonly code: ArchiveErrorCode,
    message: string,
    public readonly details?: { owner?: string; total_files?: number },
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ArchiveError";
  }
}

const STORAGE_EXHAUSTED = new Set(["ENOSPC", "EDQUOT"]);

/**
 * The storage medium is full. Callers let this propagate untouched:
 * retrying or wrapping it would hide a process-level failure.
 */
export function isStorageExhausted(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "string" &&
    STORAGE_EXHAUSTED.has(err.code)
  );
}

/** ENOENT, or ENOTDIR when a path segment is a file. */
export function isNotFound(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
