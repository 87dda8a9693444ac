import {
  type LibraryConfig,
  loadConfig,
  resolveConfig,
} from "./config/config.js";
import { AudioLibrary } from "./library/library.js";
import { JsonLogger, type Logger } from "./logging/logger.js";
import { SqliteRecordStore } from "./records/sqlite.js";

// Config
export type { ConfigErrorCode, LibraryConfig } from "./config/config.js";
export {
  ConfigError,
  DEFAULT_CONFIG,
  LibraryConfigSchema,
  loadConfig,
  resolveConfig,
} from "./config/config.js";

// Logging
export type {
  LogEntry,
  LogFields,
  LogLevel,
  Logger,
} from "./logging/logger.js";
export { JsonLogger, silentLogger } from "./logging/logger.js";

export * from "./library/index.js";
export * from "./records/index.js";
export * from "./storage/index.js";

export interface OpenedLibrary {
  library: AudioLibrary;
  config: Readonly<LibraryConfig>;
  logger: Logger;
  /** Close the record store. */
  close(): void;
}

/**
 * Composition root: config (explicit or from the environment), JSON logger,
 * SQLite record store, directories.
 */
export async function openAudioLibrary(
  overrides?: Partial<LibraryConfig>,
): Promise<OpenedLibrary> {
  const config = overrides ? resolveConfig(overrides) : loadConfig();
  const logger = new JsonLogger({ level: config.log_level });
  const store = new SqliteRecordStore({ dbPath: config.db_path });
  try {
    const library = await AudioLibrary.open({ config, store, logger });
    logger.info("Audio library ready", {
      upload_dir: config.upload_dir,
      temp_dir: config.temp_dir,
      max_size_bytes: config.max_size_bytes,
    });
    return { library, config, logger, close: () => store.close() };
  } catch (err) {
    store.close();
    throw err;
  }
}
