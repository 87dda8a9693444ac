import { cleanInput, normalizeTag } from "./normalize.js";
import type { AudioRecord } from "./types.js";

/**
 * Select the records carrying `tag`, compared the way stored tags are
 * normalized. Exact match only: "rock" does not match "rocker".
 * No tag (or a blank one) returns the input as-is.
 */
export function filterByTag<T extends Pick<AudioRecord, "tags">>(
  records: T[],
  tag?: string | null,
): T[] {
  const wanted = normalizeTag(cleanInput(tag));
  if (wanted.length === 0) return records;
  return records.filter((record) =>
    record.tags.some((t) => normalizeTag(t) === wanted),
  );
}
