import { z } from "zod";

/**
 * Metadata for one stored audio blob.
 * Created once after the blob is fully written, never mutated.
 */
export const AudioRecordSchema = z
  .object({
    id: z.string().min(1), // ULID, externally addressable handle
    owner: z.string().min(1),
    original_name: z.string().min(1), // display only, never a path
    storage_name: z.string().min(1), // on-disk name under upload_dir
    size_bytes: z.number().int().nonnegative(), // measured, not declared
    media_type: z.string().min(1),
    tags: z.array(z.string().min(1)), // normalized, unique, first-seen order
    extra_info: z.record(z.string(), z.unknown()).nullable(),
    created_at: z.string(), // ISO-8601
  })
  .strict();

export type AudioRecord = z.infer<typeof AudioRecordSchema>;

/**
 * Raw upload fields as received from the caller.
 */
export interface RecordInput {
  owner: string;
  original_name: string;
  storage_name: string;
  size_bytes: number;
  media_type: string;
  tag_text?: string;
  extra_info?: string | Record<string, unknown> | null;
}
