const MAX_INPUT_CHARS = 255;
const TAG_DELIMITER = ",";

/**
 * Clean free-text form input.
 *
 * Rules:
 * 1. Drop control characters (code points below 0x20)
 * 2. Truncate to 255 characters (code points, not UTF-16 units)
 * 3. Trim leading/trailing whitespace
 */
export function cleanInput(s: string | undefined | null): string {
  if (!s) return "";
  const chars: string[] = [];
  for (const ch of s) {
    if (ch.charCodeAt(0) < 0x20) continue;
    chars.push(ch);
    if (chars.length === MAX_INPUT_CHARS) break;
  }
  return chars.join("").trim();
}

/**
 * Normalize a single tag for storage and comparison.
 * - "  Rock " → "rock"
 */
export function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase();
}

/**
 * Parse delimiter-separated tag text into a normalized tag set.
 * Empty entries are dropped, duplicates removed keeping first-seen order.
 *
 * Examples:
 * - "Rock, rock , Pop" → ["rock", "pop"]
 * - " , ," → []
 */
export function parseTags(text: string | undefined | null): string[] {
  const seen = new Set<string>();
  for (const raw of cleanInput(text).split(TAG_DELIMITER)) {
    const tag = normalizeTag(raw);
    if (tag.length > 0) seen.add(tag);
  }
  return [...seen];
}

/**
 * Attach extra info only when it carries something.
 * - string: wrapped as `{ info }` if non-empty after cleaning
 * - mapping: kept if it has at least one key
 */
export function normalizeExtraInfo(
  raw: string | Record<string, unknown> | null | undefined,
): Record<string, unknown> | null {
  if (raw === undefined || raw === null) return null;
  if (typeof raw === "string") {
    const info = cleanInput(raw);
    return info.length > 0 ? { info } : null;
  }
  return Object.keys(raw).length > 0 ? { ...raw } : null;
}
