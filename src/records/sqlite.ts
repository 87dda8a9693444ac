import Database, {
  type Database as DatabaseType,
  type Statement,
} from "better-sqlite3";
import { z } from "zod";
import type { RecordStore } from "./store.js";
import { type AudioRecord, AudioRecordSchema } from "./types.js";

interface SqliteRecordStoreOptions {
  dbPath: string; // ":memory:" for tests, file path for production
}

/** Row shape as stored; JSON columns decoded on the way out. */
const RecordRowSchema = z.object({
  id: z.string(),
  owner: z.string(),
  original_name: z.string(),
  storage_name: z.string(),
  size_bytes: z.number(),
  media_type: z.string(),
  tags_json: z.string(),
  extra_info_json: z.string().nullable(),
  created_at: z.string(),
});

type RecordRow = z.infer<typeof RecordRowSchema>;

/**
 * SQLite implementation of RecordStore.
 * WAL mode, one table, owner index for listing.
 */
export class SqliteRecordStore implements RecordStore {
  private db: DatabaseType;
  private stmts: {
    insertRecord: Statement;
    fetchByOwner: Statement;
  };

  constructor(opts: SqliteRecordStoreOptions) {
    this.db = new Database(opts.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 3000");
    this.initSchema();
    this.stmts = this.prepareStatements();
  }

  close(): void {
    this.db.close();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS audio_records (
        id               TEXT PRIMARY KEY,
        owner            TEXT NOT NULL,
        original_name    TEXT NOT NULL,
        storage_name     TEXT NOT NULL,
        size_bytes       INTEGER NOT NULL,
        media_type       TEXT NOT NULL,
        tags_json        TEXT NOT NULL DEFAULT '[]',
        extra_info_json  TEXT,
        created_at       TEXT NOT NULL
      );

      CREATE UNIQUE INDEX IF NOT EXISTS ux_audio_records_storage_name
        ON audio_records(storage_name);
      CREATE INDEX IF NOT EXISTS idx_audio_records_owner
        ON audio_records(owner);
    `);
  }

  private prepareStatements() {
    return {
      insertRecord: this.db.prepare(`
        INSERT INTO audio_records (
          id, owner, original_name, storage_name, size_bytes,
          media_type, tags_json, extra_info_json, created_at
        ) VALUES (
          @id, @owner, @original_name, @storage_name, @size_bytes,
          @media_type, @tags_json, @extra_info_json, @created_at
        )
      `),
      fetchByOwner: this.db.prepare(`
        SELECT * FROM audio_records WHERE owner = ? ORDER BY rowid ASC
      `),
    };
  }

  private rowToRecord(row: RecordRow): AudioRecord {
    return AudioRecordSchema.parse({
      id: row.id,
      owner: row.owner,
      original_name: row.original_name,
      storage_name: row.storage_name,
      size_bytes: row.size_bytes,
      media_type: row.media_type,
      tags: JSON.parse(row.tags_json),
      extra_info:
        row.extra_info_json === null ? null : JSON.parse(row.extra_info_json),
      created_at: row.created_at,
    });
  }

  async persist(record: AudioRecord): Promise<void> {
    const valid = AudioRecordSchema.parse(record);
    this.stmts.insertRecord.run({
      id: valid.id,
      owner: valid.owner,
      original_name: valid.original_name,
      storage_name: valid.storage_name,
      size_bytes: valid.size_bytes,
      media_type: valid.media_type,
      tags_json: JSON.stringify(valid.tags),
      extra_info_json:
        valid.extra_info === null ? null : JSON.stringify(valid.extra_info),
      created_at: valid.created_at,
    });
  }

  async fetchAll(owner: string): Promise<AudioRecord[]> {
    const rows = z
      .array(RecordRowSchema)
      .parse(this.stmts.fetchByOwner.all(owner));
    return rows.map((row) => this.rowToRecord(row));
  }
}
