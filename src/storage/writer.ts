import { type FileHandle, open } from "node:fs/promises";
import { type Logger, silentLogger } from "../logging/logger.js";
import { discardFile } from "./cleanup.js";
import {
  StorageError,
  ValidationError,
  errorMessage,
  isStorageExhausted,
} from "./errors.js";

export const DEFAULT_CHUNK_SIZE = 8192;
const PROGRESS_EVERY_CHUNKS = 100;

/** Anything yielding bytes, e.g. a Node Readable or an async generator. */
export type ByteSource = AsyncIterable<Uint8Array | string>;

export interface WriteStreamOpts {
  max_size_bytes: number;
  chunk_size_bytes?: number; // default: 8 KiB
  logger?: Logger;
}

async function writeAll(handle: FileHandle, chunk: Uint8Array): Promise<void> {
  let offset = 0;
  while (offset < chunk.byteLength) {
    const { bytesWritten } = await handle.write(
      chunk,
      offset,
      chunk.byteLength - offset,
    );
    offset += bytesWritten;
  }
}

/**
 * Stream `source` into a new file at `destination`, at most
 * `chunk_size_bytes` per write, and return the number of bytes written.
 *
 * - The destination is created exclusively; an existing file is left alone.
 * - Exceeding max_size_bytes aborts before the offending chunk is written.
 * - On any failure the partial file is removed before the error surfaces.
 * - A source that errors or ends prematurely is an ordinary write failure.
 *
 * @throws ValidationError TOO_LARGE when the stream outgrows the cap
 * @throws StorageError WRITE_FAILED for other I/O failures
 * @throws the original error when the storage medium is full
 */
export async function writeStream(
  source: ByteSource,
  destination: string,
  opts: WriteStreamOpts,
): Promise<number> {
  const chunkSize = opts.chunk_size_bytes ?? DEFAULT_CHUNK_SIZE;
  const logger = opts.logger ?? silentLogger;
  const cap = opts.max_size_bytes;

  let handle: FileHandle | undefined;
  let written = 0;
  let chunks = 0;

  try {
    handle = await open(destination, "wx");

    for await (const piece of source) {
      const bytes = typeof piece === "string" ? Buffer.from(piece) : piece;
      for (let offset = 0; offset < bytes.byteLength; offset += chunkSize) {
        const chunk = bytes.subarray(offset, offset + chunkSize);
        if (written + chunk.byteLength > cap) {
          logger.error("File size limit exceeded during save", undefined, {
            destination,
            bytes_received: written + chunk.byteLength,
            max_size_bytes: cap,
          });
          throw new ValidationError(
            "TOO_LARGE",
            `File size exceeds maximum allowed size of ${cap} bytes`,
            {
              max_size_bytes: cap,
              bytes_received: written + chunk.byteLength,
            },
          );
        }
        await writeAll(handle, chunk);
        written += chunk.byteLength;
        chunks++;
        if (chunks % PROGRESS_EVERY_CHUNKS === 0) {
          logger.debug("File save progress", { destination, bytes: written });
        }
      }
    }

    await handle.sync();
    await handle.close();
    handle = undefined;
  } catch (err) {
    // EEXIST: the path belongs to someone else, nothing of ours to remove
    if (handle !== undefined) {
      await handle.close().catch((closeErr: unknown) => {
        logger.warn("Failed to close partial file", {
          destination,
          error: errorMessage(closeErr),
        });
      });
      await discardFile(destination, logger);
    }

    if (err instanceof ValidationError || isStorageExhausted(err)) throw err;
    logger.error("Error saving file", err, { destination });
    throw new StorageError(
      "WRITE_FAILED",
      `Failed to save file: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  logger.info("File saved", { destination, bytes: written });
  return written;
}
