import { extname } from "node:path";
import { ulid } from "ulid";

/** Extensions kept on storage names; anything else is dropped. */
const SAFE_EXTENSION = /^\.[A-Za-z0-9]{1,16}$/;

/** Record id: the externally addressable handle. */
export function generateRecordId(): string {
  return ulid();
}

/**
 * On-disk name for a new blob: a fresh ULID (independent of the record id)
 * plus the original extension when it is a plain alphanumeric suffix.
 *
 * Examples:
 * - "song.mp3" → "01j9...q4.mp3"
 * - "../../etc/passwd" → "01j9...q4"
 */
export function generateStorageName(originalName: string): string {
  const base = originalName.split(/[\\/]/).pop() ?? "";
  const ext = extname(base);
  return `${ulid().toLowerCase()}${SAFE_EXTENSION.test(ext) ? ext : ""}`;
}

/** Temp file name for one export artifact. */
export function exportFileName(): string {
  return `audio_export_${ulid().toLowerCase()}.zip`;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Suggested client-side name for an export:
 * `audio_files_<owner>_<YYYYMMDD_HHMMSS>.zip` (UTC).
 * Characters outside [A-Za-z0-9_-] in the owner id become "_".
 */
export function downloadName(owner: string, at: Date): string {
  const safeOwner = owner.replace(/[^A-Za-z0-9_-]/g, "_");
  const date = [at.getUTCMonth() + 1, at.getUTCDate()].map(pad).join("");
  const time = [at.getUTCHours(), at.getUTCMinutes(), at.getUTCSeconds()]
    .map(pad)
    .join("");
  const stamp = `${at.getUTCFullYear()}${date}_${time}`;
  return `audio_files_${safeOwner}_${stamp}.zip`;
}
