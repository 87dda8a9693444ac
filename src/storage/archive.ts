import { once } from "node:events";
import { type WriteStream, createReadStream, createWriteStream } from "node:fs";
import { stat } from "node:fs/promises";
import { join } from "node:path";
import { finished } from "node:stream/promises";
import { Zip, ZipDeflate, strToU8 } from "fflate";
import { z } from "zod";
import { type Logger, silentLogger } from "../logging/logger.js";
import { type AudioRecord, AudioRecordSchema } from "../records/types.js";
import { discardFile } from "./cleanup.js";
import {
  ArchiveError,
  errorMessage,
  isNotFound,
  isStorageExhausted,
} from "./errors.js";

/** Archive section holding the audio blobs. */
export const FILES_DIR = "audio_files";
/** Manifest document at the archive root. */
export const MANIFEST_NAME = "metadata.json";

const COMPRESSION_LEVEL = 6;
const READ_CHUNK_SIZE = 64 * 1024;

// ZIP without ZIP64: 32-bit sizes and offsets, 16-bit entry count
const MAX_ARCHIVE_BYTES = 0xffff_ffff;
const MAX_ENTRIES = 0xffff;
const LOCAL_HEADER = 30;
const DATA_DESCRIPTOR = 16;
const CENTRAL_HEADER = 46;
const END_RECORD = 22;

export const ExportManifestSchema = z
  .object({
    export_timestamp: z.string(),
    owner: z.string(),
    total_files: z.number().int().nonnegative(), // every record, found or not
    files: z.array(AudioRecordSchema),
  })
  .strict();

export type ExportManifest = z.infer<typeof ExportManifestSchema>;

export interface BuildArchiveOpts {
  owner: string;
  records: readonly AudioRecord[];
  storage_root: string;
  destination: string; // must not exist yet
  exported_at?: Date;
  max_archive_bytes?: number; // default: largest size a 32-bit ZIP can address
  logger?: Logger;
}

export interface ArchiveResult {
  path: string;
  size_bytes: number;
  files_included: number;
  files_missing: number;
}

/**
 * Archive path for a blob. Only the last segment of the original name is
 * used so entries cannot escape the files section on extraction.
 *
 * Examples:
 * - "song.mp3" → "audio_files/song.mp3"
 * - "../../evil.mp3" → "audio_files/evil.mp3"
 */
export function entryName(originalName: string): string {
  const segments = originalName
    .split(/[\\/]/)
    .filter((s) => s.length > 0 && s !== "." && s !== "..");
  return `${FILES_DIR}/${segments.pop() ?? "unnamed"}`;
}

export function buildManifest(
  owner: string,
  records: readonly AudioRecord[],
  exportedAt: Date,
): ExportManifest {
  return {
    export_timestamp: exportedAt.toISOString(),
    owner,
    total_files: records.length,
    files: records.map((r) => ({
      id: r.id,
      owner: r.owner,
      original_name: r.original_name,
      size_bytes: r.size_bytes,
      media_type: r.media_type,
      tags: [...r.tags],
      extra_info: r.extra_info,
      created_at: r.created_at,
      storage_name: r.storage_name,
    })),
  };
}

/**
 * Size of a stored blob, or undefined when it cannot be located.
 */
async function blobSize(path: string): Promise<number | undefined> {
  try {
    const info = await stat(path);
    return info.isFile() ? info.size : undefined;
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw err;
  }
}

/**
 * Upper bound on the bytes one entry adds to the archive: local header,
 * deflated data, data descriptor and central directory record.
 * Deflate expands incompressible input by at most 5 bytes per stored block.
 */
function entryBound(name: string, size: number): number {
  const headers = LOCAL_HEADER + DATA_DESCRIPTOR + CENTRAL_HEADER;
  const deflated = size + Math.ceil(size / 16_383) * 5 + 16;
  return headers + 2 * Buffer.byteLength(name) + deflated;
}

function whenClosed(stream: WriteStream): Promise<void> {
  if (stream.closed) return Promise.resolve();
  return new Promise((resolve) => stream.once("close", () => resolve()));
}

interface LocatedBlob {
  record: AudioRecord;
  path: string;
  name: string;
}

/**
 * Bundle an owner's blobs and a manifest into one ZIP at `destination`.
 *
 * Records whose blob is gone are skipped and counted as missing; the
 * manifest still lists every record. The archive is streamed to disk, so
 * memory use does not grow with the size of the blobs.
 *
 * The writer has no ZIP64 support: an export whose projected size exceeds
 * `max_archive_bytes` (default 4 GiB - 1) or that holds more than 65535
 * entries is refused before anything is written.
 *
 * On success the caller owns the file and must release it.
 *
 * @throws ArchiveError EMPTY_ARCHIVE when no blob could be located
 * @throws ArchiveError BUILD_FAILED on any other failure (partial file removed)
 * @throws the original error when the storage medium is full
 */
export async function buildArchive(
  opts: BuildArchiveOpts,
): Promise<ArchiveResult> {
  const logger = opts.logger ?? silentLogger;
  const limit = opts.max_archive_bytes ?? MAX_ARCHIVE_BYTES;
  const details = { owner: opts.owner, total_files: opts.records.length };

  const located: LocatedBlob[] = [];
  let missing = 0;
  let projected = END_RECORD;
  try {
    for (const record of opts.records) {
      const path = join(opts.storage_root, record.storage_name);
      const size = await blobSize(path);
      if (size === undefined) {
        missing++;
        logger.warn("File not found for archive", {
          storage_name: record.storage_name,
          original_name: record.original_name,
        });
        continue;
      }
      const name = entryName(record.original_name);
      located.push({ record, path, name });
      projected += entryBound(name, size);
    }
  } catch (err) {
    logger.error("Error locating files for archive", err, {
      owner: opts.owner,
    });
    throw new ArchiveError(
      "BUILD_FAILED",
      `Failed to create archive: ${errorMessage(err)}`,
      details,
      { cause: err },
    );
  }

  logger.info("Archive stats", {
    files_added: located.length,
    files_missing: missing,
  });

  if (located.length === 0) {
    throw new ArchiveError(
      "EMPTY_ARCHIVE",
      `No stored files found for owner ${opts.owner}`,
      details,
    );
  }

  const manifest = strToU8(
    JSON.stringify(
      buildManifest(opts.owner, opts.records, opts.exported_at ?? new Date()),
      null,
      2,
    ),
  );
  projected += entryBound(MANIFEST_NAME, manifest.byteLength);

  if (projected > limit || located.length + 1 > MAX_ENTRIES) {
    logger.error("Archive exceeds ZIP limits", undefined, {
      projected_bytes: projected,
      max_archive_bytes: limit,
      entries: located.length + 1,
    });
    throw new ArchiveError(
      "BUILD_FAILED",
      `Archive too large: up to ${projected} bytes (max ${limit})`,
      details,
    );
  }

  const out = createWriteStream(opts.destination, { flags: "wx" });
  const failure: { error?: unknown } = {};
  out.on("error", (err) => {
    failure.error ??= err;
  });

  try {
    await once(out, "ready");
  } catch (err) {
    // Not created by us: nothing to remove
    if (isStorageExhausted(err)) throw err;
    throw new ArchiveError(
      "BUILD_FAILED",
      `Failed to create archive: ${errorMessage(err)}`,
      details,
      { cause: err },
    );
  }

  const throwIfFailed = (): void => {
    if (failure.error !== undefined) throw failure.error;
  };

  try {
    const zip = new Zip((err, chunk, final) => {
      if (err) {
        failure.error ??= err;
        return;
      }
      out.write(chunk);
      if (final) out.end();
    });

    for (const blob of located) {
      const entry = new ZipDeflate(blob.name, { level: COMPRESSION_LEVEL });
      zip.add(entry);
      for await (const chunk of createReadStream(blob.path, {
        highWaterMark: READ_CHUNK_SIZE,
      })) {
        entry.push(chunk, false);
        throwIfFailed();
        if (out.writableNeedDrain) await once(out, "drain");
      }
      entry.push(new Uint8Array(0), true);
      throwIfFailed();
      logger.debug("Added file to archive", {
        original_name: blob.record.original_name,
      });
    }

    const manifestEntry = new ZipDeflate(MANIFEST_NAME, {
      level: COMPRESSION_LEVEL,
    });
    zip.add(manifestEntry);
    manifestEntry.push(manifest, true);
    zip.end();
    throwIfFailed();

    await finished(out);
    await whenClosed(out);
  } catch (err) {
    out.destroy();
    await whenClosed(out);
    await discardFile(opts.destination, logger);

    if (isStorageExhausted(err)) throw err;
    logger.error("Error creating archive", err, {
      destination: opts.destination,
    });
    throw new ArchiveError(
      "BUILD_FAILED",
      `Failed to create archive: ${errorMessage(err)}`,
      details,
      { cause: err },
    );
  }

  logger.info("Archive created", {
    destination: opts.destination,
    bytes: out.bytesWritten,
  });

  return {
    path: opts.destination,
    size_bytes: out.bytesWritten,
    files_included: located.length,
    files_missing: missing,
  };
}
