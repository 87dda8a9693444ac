import { generateRecordId } from "../storage/naming.js";
import { normalizeExtraInfo, parseTags } from "./normalize.js";
import {
  type AudioRecord,
  AudioRecordSchema,
  type RecordInput,
} from "./types.js";

export interface BuildRecordOpts {
  id?: string; // default: fresh ULID
  now?: Date; // default: current time
}

/**
 * Assemble a Metadata Record from a finished upload. Pure apart from id
 * generation; persisting it is the record store's job.
 *
 * @throws ZodError if the measured fields are out of range
 * (negative size, empty name)
 */
export function buildRecord(
  input: RecordInput,
  opts: BuildRecordOpts = {},
): AudioRecord {
  return AudioRecordSchema.parse({
    id: opts.id ?? generateRecordId(),
    owner: input.owner,
    original_name: input.original_name,
    storage_name: input.storage_name,
    size_bytes: input.size_bytes,
    media_type: input.media_type,
    tags: parseTags(input.tag_text),
    extra_info: normalizeExtraInfo(input.extra_info),
    created_at: (opts.now ?? new Date()).toISOString(),
  });
}
