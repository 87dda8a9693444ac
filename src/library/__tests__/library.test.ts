import { existsSync } from "node:fs";
import { readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { strFromU8 } from "fflate";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  MiB,
  byteSource,
  brokenSource,
  listDir,
  makeTempDir,
  removeDir,
  unzip,
  zipEntryNames,
} from "../../__tests__/fixtures.js";
import { type LibraryConfig, resolveConfig } from "../../config/config.js";
import { RecordError } from "../../records/errors.js";
import { SqliteRecordStore } from "../../records/sqlite.js";
import type { RecordStore } from "../../records/store.js";
import type { AudioRecord } from "../../records/types.js";
import { ExportManifestSchema } from "../../storage/archive.js";
import { ArchiveError, ValidationError } from "../../storage/errors.js";
import { AudioLibrary } from "../library.js";

const NOW = new Date("2026-05-04T10:20:30.000Z");

describe("AudioLibrary", () => {
  let root: string;
  let config: Readonly<LibraryConfig>;
  let store: SqliteRecordStore;
  let library: AudioLibrary;

  beforeEach(async () => {
    root = await makeTempDir();
    config = resolveConfig({
      upload_dir: join(root, "uploads"),
      temp_dir: join(root, "temp"),
      db_path: ":memory:",
    });
    store = new SqliteRecordStore({ dbPath: ":memory:" });
    library = await AudioLibrary.open({ config, store, clock: () => NOW });
  });

  afterEach(async () => {
    store.close();
    await removeDir(root);
  });

  function upload(owner: string, name: string, content: string, tags = "") {
    async function* source() {
      yield content;
    }
    return library.upload({
      owner,
      original_name: name,
      declared_type: "audio/mpeg",
      tag_text: tags,
      source: source(),
    });
  }

  describe("open", () => {
    test("creates the upload and temp directories", () => {
      expect(existsSync(config.upload_dir)).toBe(true);
      expect(existsSync(config.temp_dir)).toBe(true);
    });
  });

  describe("upload", () => {
    test("stores the blob and returns the record", async () => {
      const rec = await library.upload({
        owner: "user-1",
        original_name: "song.mp3",
        declared_type: "audio/mpeg",
        declared_size: 1000,
        tag_text: "Rock, rock , Pop",
        source: byteSource(1000),
      });

      expect(rec.owner).toBe("user-1");
      expect(rec.original_name).toBe("song.mp3");
      expect(rec.media_type).toBe("audio/mpeg");
      expect(rec.size_bytes).toBe(1000);
      expect(rec.tags).toEqual(["rock", "pop"]);
      expect(rec.extra_info).toBeNull();
      expect(rec.created_at).toBe("2026-05-04T10:20:30.000Z");
      expect(rec.storage_name).toMatch(/^[0-9a-z]{26}\.mp3$/);

      const blob = await readFile(join(config.upload_dir, rec.storage_name));
      expect(blob.byteLength).toBe(1000);
      expect(await store.fetchAll("user-1")).toEqual([rec]);
    });

    test("records the measured size, not the declared one", async () => {
      const rec = await library.upload({
        owner: "user-1",
        original_name: "song.mp3",
        declared_type: "audio/mpeg",
        declared_size: 10,
        source: byteSource(2500),
      });

      expect(rec.size_bytes).toBe(2500);
    });

    test("infers the type from the name when none is declared", async () => {
      const rec = await library.upload({
        owner: "user-1",
        original_name: "song.mp3",
        source: byteSource(10),
      });

      expect(rec.media_type).toBe("audio/mpeg");
    });

    test("wraps free-text extra info", async () => {
      const rec = await library.upload({
        owner: "user-1",
        original_name: "song.mp3",
        extra_info: "live take",
        source: byteSource(10),
      });

      expect(rec.extra_info).toEqual({ info: "live take" });
    });

    test("blank owner is MISSING_OWNER", async () => {
      await expect(upload("   ", "song.mp3", "abc")).rejects.toMatchObject({
        code: "MISSING_OWNER",
      });
      expect(await listDir(config.upload_dir)).toEqual([]);
    });

    test("missing source is MISSING_FILE", async () => {
      await expect(
        library.upload({ owner: "user-1", original_name: "song.mp3" }),
      ).rejects.toMatchObject({ code: "MISSING_FILE" });
    });

    test("unsupported type stores nothing", async () => {
      const err = await library
        .upload({
          owner: "user-1",
          original_name: "notes.txt",
          declared_type: "text/plain",
          source: byteSource(10),
        })
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({
        code: "UNSUPPORTED_TYPE",
        message: "Unsupported file type. Supported types: audio/mp3, audio/mpeg",
      });
      expect(await listDir(config.upload_dir)).toEqual([]);
      expect(await store.fetchAll("user-1")).toEqual([]);
    });

    test("declared oversize is rejected before reading the source", async () => {
      let pulled = false;
      async function* source() {
        pulled = true;
        yield "x";
      }

      await expect(
        library.upload({
          owner: "user-1",
          original_name: "big.mp3",
          declared_size: 60 * MiB,
          source: source(),
        }),
      ).rejects.toMatchObject({
        code: "TOO_LARGE",
        message: "File too large (max 50MB)",
      });
      expect(pulled).toBe(false);
    });

    test("undeclared 60 MiB stream against a 50 MiB cap leaves nothing", async () => {
      await expect(
        library.upload({
          owner: "user-1",
          original_name: "big.mp3",
          declared_type: "audio/mpeg",
          source: byteSource(60 * MiB, 64 * 1024),
        }),
      ).rejects.toMatchObject({ code: "TOO_LARGE" });

      expect(await listDir(config.upload_dir)).toEqual([]);
      expect(await store.fetchAll("user-1")).toEqual([]);
    });

    test("a broken source is WRITE_FAILED and leaves nothing", async () => {
      await expect(
        library.upload({
          owner: "user-1",
          original_name: "song.mp3",
          source: brokenSource(4096),
        }),
      ).rejects.toMatchObject({ code: "WRITE_FAILED" });

      expect(await listDir(config.upload_dir)).toEqual([]);
      expect(await store.fetchAll("user-1")).toEqual([]);
    });

    test("a failed persist removes the blob", async () => {
      const failing: RecordStore = {
        persist: async () => {
          throw new Error("disk I/O error");
        },
        fetchAll: async () => [],
      };
      const lib = new AudioLibrary({ config, store: failing });

      const err = await lib
        .upload({
          owner: "user-1",
          original_name: "song.mp3",
          source: byteSource(100),
        })
        .catch((e: unknown) => e);

      expect(err).toBeInstanceOf(RecordError);
      expect(err).toMatchObject({
        code: "PERSIST_FAILED",
        message: "Failed to save metadata: disk I/O error",
        details: { owner: "user-1" },
      });
      expect(await listDir(config.upload_dir)).toEqual([]);
    });
  });

  describe("list", () => {
    test("returns only the owner's records in upload order", async () => {
      const first = await upload("user-1", "a.mp3", "a", "rock");
      await upload("user-2", "b.mp3", "b", "rock");
      const third = await upload("user-1", "c.mp3", "c", "jazz");

      expect(await library.list("user-1")).toEqual([first, third]);
    });

    test("filters by normalized tag", async () => {
      const rock = await upload("user-1", "a.mp3", "a", "Rock, rock , Pop");
      await upload("user-1", "b.mp3", "b", "jazz");

      expect(await library.list("user-1", "ROCK")).toEqual([rock]);
      expect(await library.list("user-1", "roc")).toEqual([]);
    });

    test("blank tag means no filter", async () => {
      await upload("user-1", "a.mp3", "a", "rock");
      await upload("user-1", "b.mp3", "b");

      expect(await library.list("user-1", "  ")).toHaveLength(2);
    });

    test("an unknown owner has no records", async () => {
      expect(await library.list("nobody")).toEqual([]);
    });

    test("a failing store is FETCH_FAILED", async () => {
      const failing: RecordStore = {
        persist: async () => {},
        fetchAll: async () => {
          throw new Error("database is locked");
        },
      };
      const lib = new AudioLibrary({ config, store: failing });

      await expect(lib.list("user-1")).rejects.toMatchObject({
        code: "FETCH_FAILED",
        message: "Failed to load records: database is locked",
      });
    });
  });

  describe("export", () => {
    test("bundles every file of the owner with a manifest", async () => {
      const a = await upload("user-1", "a.mp3", "AAA", "rock");
      const b = await upload("user-1", "b.mp3", "BBB");
      await upload("user-2", "other.mp3", "zzz");

      const artifact = await library.export("user-1");

      expect(artifact.download_name).toBe("audio_files_user-1_20260504_102030.zip");
      expect(artifact.files_included).toBe(2);
      expect(artifact.files_missing).toBe(0);
      expect(artifact.path.startsWith(config.temp_dir)).toBe(true);

      const data = await readFile(artifact.path);
      expect(artifact.size_bytes).toBe(data.byteLength);
      expect(zipEntryNames(data)).toEqual([
        "audio_files/a.mp3",
        "audio_files/b.mp3",
        "metadata.json",
      ]);
      const manifest = ExportManifestSchema.parse(
        JSON.parse(strFromU8(unzip(data)["metadata.json"] ?? new Uint8Array())),
      );
      expect(manifest.owner).toBe("user-1");
      expect(manifest.total_files).toBe(2);
      expect(manifest.export_timestamp).toBe("2026-05-04T10:20:30.000Z");
      expect(manifest.files).toEqual([a, b]);
    });

    test("skips records whose blob is gone", async () => {
      const kept = await upload("user-1", "kept.mp3", "k");
      const lost: AudioRecord = {
        ...kept,
        id: "lost-1",
        original_name: "lost.mp3",
        storage_name: "never-written.mp3",
      };
      await store.persist(lost);

      const artifact = await library.export("user-1");

      expect(artifact.files_included).toBe(1);
      expect(artifact.files_missing).toBe(1);
      expect(zipEntryNames(await readFile(artifact.path))).toEqual([
        "audio_files/kept.mp3",
        "metadata.json",
      ]);
    });

    test("an owner without records is EMPTY_ARCHIVE", async () => {
      const err = await library.export("user-1").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ArchiveError);
      expect(err).toMatchObject({
        code: "EMPTY_ARCHIVE",
        message: "No files found for owner user-1",
      });
      expect(await listDir(config.temp_dir)).toEqual([]);
    });

    test("records without any blob are EMPTY_ARCHIVE", async () => {
      const rec = await upload("user-1", "a.mp3", "a");
      await rm(join(config.upload_dir, rec.storage_name));

      await expect(library.export("user-1")).rejects.toMatchObject({
        code: "EMPTY_ARCHIVE",
      });
      expect(await listDir(config.temp_dir)).toEqual([]);
    });

    test("each export gets its own artifact", async () => {
      await upload("user-1", "a.mp3", "a");

      const first = await library.export("user-1");
      const second = await library.export("user-1");

      expect(first.path).not.toBe(second.path);
      expect(await listDir(config.temp_dir)).toHaveLength(2);
    });
  });

  describe("release", () => {
    test("removes the artifact and is idempotent", async () => {
      await upload("user-1", "a.mp3", "a");
      const artifact = await library.export("user-1");

      await library.release(artifact);
      await library.release(artifact);

      expect(existsSync(artifact.path)).toBe(false);
      expect(await listDir(config.temp_dir)).toEqual([]);
    });

    test("a path that does not exist is fine", async () => {
      await expect(
        library.release(join(config.temp_dir, "ghost.zip")),
      ).resolves.toBeUndefined();
    });
  });
});
