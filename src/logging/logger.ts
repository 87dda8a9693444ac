import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogFields = Record<string, unknown>;

/**
 * One emitted log line, serialized as JSON.
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  logger: string;
  message: string;
  data?: LogFields;
  error?: string;
  stack?: string;
  [binding: string]: unknown;
}

export interface Logger {
  debug(message: string, data?: LogFields): void;
  info(message: string, data?: LogFields): void;
  warn(message: string, data?: LogFields): void;
  error(message: string, err?: unknown, data?: LogFields): void;
  /** Derive a logger that stamps `bindings` onto every entry. */
  child(name: string, bindings?: LogFields): Logger;
}

export interface JsonLoggerOpts {
  name?: string;
  level?: LogLevel;
  bindings?: LogFields;
  sink?: (line: string) => void;
  clock?: () => Date;
}

const stdoutSink = (line: string): void => {
  process.stdout.write(`${line}\n`);
};

/**
 * Structured logger writing one JSON object per line.
 * Entries below `level` are dropped before serialization.
 */
export class JsonLogger implements Logger {
  private readonly name: string;
  private readonly level: LogLevel;
  private readonly bindings: LogFields;
  private readonly sink: (line: string) => void;
  private readonly clock: () => Date;

  constructor(opts: JsonLoggerOpts = {}) {
    this.name = opts.name ?? "audio-locker";
    this.level = opts.level ?? "info";
    this.bindings = opts.bindings ?? {};
    this.sink = opts.sink ?? stdoutSink;
    this.clock = opts.clock ?? (() => new Date());
  }

  debug(message: string, data?: LogFields): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: LogFields): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: LogFields): void {
    this.write("warn", message, data);
  }

  error(message: string, err?: unknown, data?: LogFields): void {
    if (!this.enabled("error")) return;
    const entry = this.entry("error", message, data);
    if (err instanceof Error) {
      entry.error = err.message;
      entry.stack = err.stack;
    } else if (err !== undefined) {
      entry.error = String(err);
    }
    this.sink(JSON.stringify(entry));
  }

  child(name: string, bindings: LogFields = {}): Logger {
    return new JsonLogger({
      name: `${this.name}.${name}`,
      level: this.level,
      bindings: { ...this.bindings, ...bindings },
      sink: this.sink,
      clock: this.clock,
    });
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private entry(level: LogLevel, message: string, data?: LogFields): LogEntry {
    const entry: LogEntry = {
      ...this.bindings,
      timestamp: this.clock().toISOString(),
      level,
      logger: this.name,
      message,
    };
    if (data !== undefined) entry.data = data;
    return entry;
  }

  private write(level: LogLevel, message: string, data?: LogFields): void {
    if (!this.enabled(level)) return;
    this.sink(JSON.stringify(this.entry(level, message, data)));
  }
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
