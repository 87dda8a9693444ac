import { z } from "zod";
import { LogLevelSchema } from "../logging/logger.js";

export type ConfigErrorCode = "INVALID_CONFIG";

export class ConfigError extends Error {
  constructor(
    public readonly code: ConfigErrorCode,
    message: string,
    public readonly details?: { issues: string[] },
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export const LibraryConfigSchema = z
  .object({
    upload_dir: z.string().min(1),
    temp_dir: z.string().min(1),
    db_path: z.string().min(1),
    max_size_bytes: z.number().int().positive(),
    allowed_media_types: z.array(z.string().min(1)).nonempty(),
    chunk_size_bytes: z.number().int().positive(),
    log_level: LogLevelSchema,
  })
  .strict();

export type LibraryConfig = z.infer<typeof LibraryConfigSchema>;

export const DEFAULT_CONFIG: Readonly<LibraryConfig> = {
  upload_dir: "audio_uploads",
  temp_dir: "temp_downloads",
  db_path: "audio_metadata.db",
  max_size_bytes: 50 * 1024 * 1024,
  allowed_media_types: ["audio/mpeg", "audio/mp3"],
  chunk_size_bytes: 8192,
  log_level: "info",
};

/** Env var → config field */
const ENV_KEYS = {
  upload_dir: "AUDIO_UPLOAD_DIR",
  temp_dir: "AUDIO_TEMP_DIR",
  db_path: "AUDIO_DB_PATH",
  max_size_bytes: "AUDIO_MAX_SIZE_BYTES",
  allowed_media_types: "AUDIO_ALLOWED_TYPES",
  chunk_size_bytes: "AUDIO_CHUNK_SIZE_BYTES",
  log_level: "LOG_LEVEL",
} as const satisfies Record<keyof LibraryConfig, string>;

const EnvSchema = z.object({
  [ENV_KEYS.upload_dir]: z.string().trim().min(1).optional(),
  [ENV_KEYS.temp_dir]: z.string().trim().min(1).optional(),
  [ENV_KEYS.db_path]: z.string().trim().min(1).optional(),
  [ENV_KEYS.max_size_bytes]: z.coerce.number().int().positive().optional(),
  [ENV_KEYS.allowed_media_types]: z
    .string()
    .transform((s) =>
      s
        .split(",")
        .map((t) => t.trim().toLowerCase())
        .filter((t) => t.length > 0),
    )
    .refine((types) => types.length > 0, "must list at least one media type")
    .optional(),
  [ENV_KEYS.chunk_size_bytes]: z.coerce.number().int().positive().optional(),
  [ENV_KEYS.log_level]: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(LogLevelSchema)
    .optional(),
});

function formatIssues(error: z.ZodError, prefix = ""): string[] {
  return error.issues.map(
    (issue) => `${prefix}${issue.path.join(".") || "(root)"}: ${issue.message}`,
  );
}

function freeze(config: LibraryConfig): Readonly<LibraryConfig> {
  Object.freeze(config.allowed_media_types);
  return Object.freeze(config);
}

/**
 * Merge overrides over DEFAULT_CONFIG and validate the result.
 * The returned value is frozen (including allowed_media_types).
 *
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(
  overrides: Partial<LibraryConfig> = {},
): Readonly<LibraryConfig> {
  const merged = {
    ...DEFAULT_CONFIG,
    ...overrides,
    allowed_media_types: [
      ...(overrides.allowed_media_types ?? DEFAULT_CONFIG.allowed_media_types),
    ],
  };
  const parsed = LibraryConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(
      "INVALID_CONFIG",
      `Invalid configuration: ${issues.join("; ")}`,
      { issues },
    );
  }
  return freeze(parsed.data);
}

/**
 * Build configuration from environment variables.
 * Unset variables fall back to DEFAULT_CONFIG; empty strings count as unset.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): Readonly<LibraryConfig> {
  const present = Object.fromEntries(
    Object.values(ENV_KEYS)
      .filter((key) => env[key] !== undefined && env[key] !== "")
      .map((key) => [key, env[key]]),
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error, "env ");
    throw new ConfigError(
      "INVALID_CONFIG",
      `Invalid configuration: ${issues.join("; ")}`,
      { issues },
    );
  }

  const vars = parsed.data;
  const overrides: Partial<LibraryConfig> = {};
  const uploadDir = vars[ENV_KEYS.upload_dir];
  if (uploadDir !== undefined) overrides.upload_dir = uploadDir;
  const tempDir = vars[ENV_KEYS.temp_dir];
  if (tempDir !== undefined) overrides.temp_dir = tempDir;
  const dbPath = vars[ENV_KEYS.db_path];
  if (dbPath !== undefined) overrides.db_path = dbPath;
  const maxSize = vars[ENV_KEYS.max_size_bytes];
  if (maxSize !== undefined) overrides.max_size_bytes = maxSize;
  const chunkSize = vars[ENV_KEYS.chunk_size_bytes];
  if (chunkSize !== undefined) overrides.chunk_size_bytes = chunkSize;
  const logLevel = vars[ENV_KEYS.log_level];
  if (logLevel !== undefined) overrides.log_level = logLevel;

  const types = vars[ENV_KEYS.allowed_media_types];
  if (types !== undefined) {
    const [first, ...rest] = types;
    if (first !== undefined) overrides.allowed_media_types = [first, ...rest];
  }

  return resolveConfig(overrides);
}
