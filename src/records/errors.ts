/**
 * Error codes for record persistence.
 */
export type RecordErrorCode =
  | "PERSIST_FAILED" // record store rejected the write; blob already removed
  | "FETCH_FAILED"; // record store query failed

export class RecordError extends Error {
  constructor(
    public readonly code: RecordErrorCode,
    message: string,
    public readonly details?: { record_id?: string; owner?: string },
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RecordError";
  }
}
