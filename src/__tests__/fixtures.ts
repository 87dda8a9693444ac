import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { unzipSync } from "fflate";

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "audio-locker-"));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function listDir(dir: string): Promise<string[]> {
  return (await readdir(dir)).sort();
}

/**
 * Yield `total` bytes of `fill` in pieces of `pieceSize`.
 * Full-size pieces share one buffer so large streams stay cheap.
 */
export async function* byteSource(
  total: number,
  pieceSize = 4096,
  fill = 0x61,
): AsyncGenerator<Uint8Array> {
  const full = new Uint8Array(pieceSize).fill(fill);
  let sent = 0;
  while (sent < total) {
    const n = Math.min(pieceSize, total - sent);
    yield n === pieceSize ? full : new Uint8Array(n).fill(fill);
    sent += n;
  }
}

/** Yield `before` bytes, then fail like a dropped connection. */
export async function* brokenSource(
  before: number,
  error: Error = new Error("connection reset"),
): AsyncGenerator<Uint8Array> {
  yield* byteSource(before);
  throw error;
}

/** Entry names in central-directory order, duplicates included. */
export function zipEntryNames(data: Uint8Array): string[] {
  const names: string[] = [];
  unzipSync(data, {
    filter: (file) => {
      names.push(file.name);
      return false;
    },
  });
  return names;
}

export function unzip(data: Uint8Array): Record<string, Uint8Array> {
  return unzipSync(data);
}

export const MiB = 1024 * 1024;
