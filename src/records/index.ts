// Types
export type { AudioRecord, RecordInput } from "./types.js";
export { AudioRecordSchema } from "./types.js";

// Errors
export { RecordError } from "./errors.js";
export type { RecordErrorCode } from "./errors.js";

// Interface
export type { RecordStore } from "./store.js";
export { SqliteRecordStore } from "./sqlite.js";

// Construction + filtering
export type { BuildRecordOpts } from "./record.js";
export { buildRecord } from "./record.js";
export { filterByTag } from "./tag-filter.js";

// Utilities
export {
  cleanInput,
  normalizeExtraInfo,
  normalizeTag,
  parseTags,
} from "./normalize.js";
