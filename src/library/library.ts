import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { LibraryConfig } from "../config/config.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import { RecordError } from "../records/errors.js";
import { buildRecord } from "../records/record.js";
import type { RecordStore } from "../records/store.js";
import { filterByTag } from "../records/tag-filter.js";
import type { AudioRecord } from "../records/types.js";
import { buildArchive } from "../storage/archive.js";
import { discardFile } from "../storage/cleanup.js";
import {
  ArchiveError,
  ValidationError,
  errorMessage,
} from "../storage/errors.js";
import {
  downloadName,
  exportFileName,
  generateRecordId,
  generateStorageName,
} from "../storage/naming.js";
import {
  type MediaTypePolicy,
  type ValidatedUpload,
  createMediaTypePolicy,
  validateUpload,
} from "../storage/validator.js";
import { type ByteSource, writeStream } from "../storage/writer.js";

export interface AudioLibraryOpts {
  config: Readonly<LibraryConfig>;
  store: RecordStore;
  logger?: Logger;
  clock?: () => Date;
  /** Override extension-based type inference (default: mime-types lookup). */
  inferMediaType?: (filename: string) => string | undefined;
}

/**
 * One upload as received from the transport layer. `owner` comes from the
 * identity layer and is trusted as-is.
 */
export interface UploadInput {
  owner: string;
  original_name?: string | null;
  declared_type?: string | null;
  declared_size?: number | null;
  tag_text?: string | null;
  extra_info?: string | Record<string, unknown> | null;
  source?: ByteSource | null;
}

/**
 * A finished export. The caller owns `path` and must pass this back to
 * `release` once the file has been delivered.
 */
export interface ExportArtifact {
  path: string;
  download_name: string;
  size_bytes: number;
  files_included: number;
  files_missing: number;
}

function requireOwner(owner: string): string {
  const trimmed = owner.trim();
  if (trimmed.length === 0) {
    throw new ValidationError("MISSING_OWNER", "Owner id required");
  }
  return trimmed;
}

/**
 * Owner-scoped audio storage: streaming uploads, tag listing, ZIP export.
 *
 * Upload is write-then-record. If the record cannot be persisted the blob is
 * removed before the error surfaces, so a visible record always has a blob.
 * A crash between the two steps can leave an orphan blob without a record;
 * that is tolerated and left to out-of-band reconciliation.
 */
export class AudioLibrary {
  private readonly config: Readonly<LibraryConfig>;
  private readonly store: RecordStore;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly policy: MediaTypePolicy;

  constructor(opts: AudioLibraryOpts) {
    this.config = opts.config;
    this.store = opts.store;
    this.logger = opts.logger ?? silentLogger;
    this.clock = opts.clock ?? (() => new Date());
    this.policy = createMediaTypePolicy({
      max_size_bytes: opts.config.max_size_bytes,
      allowed_media_types: opts.config.allowed_media_types,
      infer: opts.inferMediaType,
    });
  }

  /**
   * Create the upload and temp directories, then return a ready library.
   */
  static async open(opts: AudioLibraryOpts): Promise<AudioLibrary> {
    await mkdir(opts.config.upload_dir, { recursive: true });
    await mkdir(opts.config.temp_dir, { recursive: true });
    return new AudioLibrary(opts);
  }

  /**
   * Validate, stream to disk, then record.
   *
   * @throws ValidationError MISSING_OWNER | MISSING_FILE | TOO_LARGE |
   *   UNSUPPORTED_TYPE
   * @throws StorageError WRITE_FAILED (partial blob removed)
   * @throws RecordError PERSIST_FAILED (blob removed)
   */
  async upload(input: UploadInput): Promise<AudioRecord> {
    const owner = requireOwner(input.owner);
    const log = this.logger.child("upload", { owner });
    const validated = this.validate(input, log);

    const recordId = generateRecordId();
    const storageName = generateStorageName(validated.original_name);
    const blobPath = join(this.config.upload_dir, storageName);

    let sizeBytes: number;
    try {
      sizeBytes = await writeStream(validated.source, blobPath, {
        max_size_bytes: this.config.max_size_bytes,
        chunk_size_bytes: this.config.chunk_size_bytes,
        logger: log,
      });
    } catch (err) {
      log.error("File operation failed", err, {
        operation: "upload",
        original_name: validated.original_name,
      });
      throw err;
    }
    log.info("File operation succeeded", {
      operation: "upload",
      original_name: validated.original_name,
      size_bytes: sizeBytes,
    });

    let record: AudioRecord;
    try {
      record = buildRecord(
        {
          owner,
          original_name: validated.original_name,
          storage_name: storageName,
          size_bytes: sizeBytes,
          media_type: validated.media_type,
          tag_text: input.tag_text ?? undefined,
          extra_info: input.extra_info,
        },
        { id: recordId, now: this.clock() },
      );
      await this.store.persist(record);
    } catch (err) {
      log.error("Database operation failed", err, {
        operation: "insert",
        table: "audio_records",
        record_id: recordId,
      });
      await discardFile(blobPath, log);
      throw new RecordError(
        "PERSIST_FAILED",
        `Failed to save metadata: ${errorMessage(err)}`,
        { record_id: recordId, owner },
        { cause: err },
      );
    }

    log.info("Database operation succeeded", {
      operation: "insert",
      table: "audio_records",
      record_id: record.id,
    });
    return record;
  }

  /**
   * The owner's records in persistence order, optionally narrowed to one tag.
   *
   * @throws RecordError FETCH_FAILED
   */
  async list(owner: string, tag?: string | null): Promise<AudioRecord[]> {
    const id = requireOwner(owner);
    const records = await this.fetchAll(id);
    return filterByTag(records, tag);
  }

  /**
   * Bundle every stored file of the owner plus a manifest into one ZIP.
   *
   * @throws ArchiveError EMPTY_ARCHIVE when the owner has no locatable file
   * @throws ArchiveError BUILD_FAILED (partial artifact removed)
   * @throws RecordError FETCH_FAILED
   */
  async export(owner: string): Promise<ExportArtifact> {
    const id = requireOwner(owner);
    const log = this.logger.child("export", { owner: id });
    const records = await this.fetchAll(id);

    if (records.length === 0) {
      log.warn("No files found for export");
      throw new ArchiveError(
        "EMPTY_ARCHIVE",
        `No files found for owner ${id}`,
        { owner: id, total_files: 0 },
      );
    }

    const exportedAt = this.clock();
    const name = downloadName(id, exportedAt);
    try {
      const result = await buildArchive({
        owner: id,
        records,
        storage_root: this.config.upload_dir,
        destination: join(this.config.temp_dir, exportFileName()),
        exported_at: exportedAt,
        logger: log,
      });
      log.info("File operation succeeded", {
        operation: "download",
        download_name: name,
        size_bytes: result.size_bytes,
      });
      return { ...result, download_name: name };
    } catch (err) {
      log.error("File operation failed", err, {
        operation: "download",
        download_name: name,
      });
      throw err;
    }
  }

  /**
   * Delete a delivered export artifact. Safe to call repeatedly or for a
   * path that no longer exists; never throws.
   */
  async release(artifact: ExportArtifact | string): Promise<void> {
    const path = typeof artifact === "string" ? artifact : artifact.path;
    await discardFile(path, this.logger.child("release"));
  }

  private validate(
    input: UploadInput,
    log: Logger,
  ): ValidatedUpload<ByteSource> {
    try {
      return validateUpload(
        {
          source: input.source,
          original_name: input.original_name,
          declared_size: input.declared_size,
          declared_type: input.declared_type,
        },
        this.policy,
      );
    } catch (err) {
      log.warn("Upload rejected", {
        original_name: input.original_name ?? null,
        reason: err instanceof ValidationError ? err.code : errorMessage(err),
      });
      throw err;
    }
  }

  private async fetchAll(owner: string): Promise<AudioRecord[]> {
    try {
      const records = await this.store.fetchAll(owner);
      this.logger.debug("Database operation succeeded", {
        operation: "select",
        table: "audio_records",
        owner,
        count: records.length,
      });
      return records;
    } catch (err) {
      this.logger.error("Database operation failed", err, {
        operation: "select",
        table: "audio_records",
        owner,
      });
      throw new RecordError(
        "FETCH_FAILED",
        `Failed to load records: ${errorMessage(err)}`,
        { owner },
        { cause: err },
      );
    }
  }
}
