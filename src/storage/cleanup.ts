import { rm } from "node:fs/promises";
import type { Logger } from "../logging/logger.js";

/**
 * Best-effort removal of a file this process created: partial blobs,
 * compensated uploads, delivered export artifacts.
 *
 * Idempotent; a missing file is not an error. A failed delete is logged and
 * reported as `false`, never thrown, since by the time this runs the primary
 * result has usually been delivered already.
 */
export async function discardFile(
  path: string,
  logger: Logger,
): Promise<boolean> {
  try {
    await rm(path, { force: true });
    logger.debug("Removed file", { path });
    return true;
  } catch (err) {
    logger.error("Failed to clean up file", err, { path });
    return false;
  }
}
