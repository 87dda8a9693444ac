// Errors
export type {
  ArchiveErrorCode,
  StorageErrorCode,
  ValidationErrorCode,
} from "./errors.js";
export {
  ArchiveError,
  StorageError,
  ValidationError,
  isStorageExhausted,
} from "./errors.js";

// Validation
export type {
  MediaTypePolicy,
  UploadCandidate,
  ValidatedUpload,
} from "./validator.js";
export {
  createMediaTypePolicy,
  inferMediaType,
  normalizeMediaType,
  resolveMediaType,
  validateUpload,
} from "./validator.js";

// Naming
export {
  downloadName,
  exportFileName,
  generateRecordId,
  generateStorageName,
} from "./naming.js";

// Streaming writer
export type { ByteSource, WriteStreamOpts } from "./writer.js";
export { DEFAULT_CHUNK_SIZE, writeStream } from "./writer.js";

// Archive
export type {
  ArchiveResult,
  BuildArchiveOpts,
  ExportManifest,
} from "./archive.js";
export {
  ExportManifestSchema,
  FILES_DIR,
  MANIFEST_NAME,
  buildArchive,
  buildManifest,
  entryName,
} from "./archive.js";

// Cleanup
export { discardFile } from "./cleanup.js";
