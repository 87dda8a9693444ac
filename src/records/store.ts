import type { AudioRecord } from "./types.js";

/**
 * Persistence collaborator for Metadata Records.
 * Implementations: SqliteRecordStore (production and tests via ":memory:")
 */
export interface RecordStore {
  /**
   * Persist a new record. Resolves once the write is acknowledged;
   * the record is visible to fetchAll only after that.
   */
  persist(record: AudioRecord): Promise<void>;

  /**
   * All records of one owner, in the order they were persisted.
   */
  fetchAll(owner: string): Promise<AudioRecord[]>;
}
