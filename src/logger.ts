import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/**
 * Default maximum size (in bytes) of the primary log file before a rotation is
 * triggered.
 */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB

/** Default number of historical log files retained during rotation. */
const DEFAULT_MAX_FILE_COUNT = 5;

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

/** Destination of the JSON lines; `process.stdout` and `process.stderr` both fit. */
export interface LogStream {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  /** Defaults to `process.stdout`. */
  readonly stream?: LogStream;
  readonly logFile?: string | null;
  /** Entries below this level are dropped. Defaults to `debug`. */
  readonly level?: LogLevel;
  /** Maximum size in bytes before the active log file is rotated. */
  readonly maxFileSizeBytes?: number;
  /** Number of historical log files to retain (including the active one). */
  readonly maxFileCount?: number;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
  /** Fields merged into every object payload, e.g. the graph being processed. */
  readonly bindings?: Record<string, unknown>;
}

/**
 * Appends lines to a log file, rotating it by size. Writes are queued
 * sequentially so entries keep their emission order, even when several child
 * loggers share the same sink.
 */
class LogFileSink {
  private writeQueue: Promise<void> = Promise.resolve();
  /**
   * Tracks whether the directory containing {@link logFile} has already been
   * created, so `mkdir` only runs once per sink.
   */
  private logDirectoryReady = false;

  constructor(
    readonly logFile: string,
    private readonly maxFileSizeBytes: number,
    private readonly maxFileCount: number,
  ) {}

  write(line: string): void {
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await this.ensureLogDestination();
        await this.rotateIfNeeded(Buffer.byteLength(line, "utf8"));
        await appendFile(this.logFile, line, "utf8");
      } catch (err) {
        const errorEntry: LogEntry = {
          timestamp: new Date().toISOString(),
          level: "error",
          message: "log_file_write_failed",
          payload: err instanceof Error ? { message: err.message } : { error: String(err) },
        };
        process.stderr.write(`${JSON.stringify(errorEntry)}\n`);
        // Allow future attempts to retry directory creation after a failure.
        this.logDirectoryReady = false;
      }
    });
  }

  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private async ensureLogDestination(): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(this.logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /**
   * Rotates the active log file when appending the provided payload would
   * exceed the configured size limit.
   */
  private async rotateIfNeeded(pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      const stats = await stat(this.logFile);
      currentSize = stats.size;
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw error;
    }

    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }
    await this.performRotation();
  }

  /** Executes the rotation sequence while honouring {@link maxFileCount}. */
  private async performRotation(): Promise<void> {
    const keep = this.maxFileCount;
    if (keep === 1) {
      await rm(this.logFile, { force: true });
      return;
    }

    await rm(`${this.logFile}.${keep - 1}`, { force: true });
    for (let index = keep - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${this.logFile}.${index}`, `${this.logFile}.${index + 1}`);
    }
    await renameIfPresent(this.logFile, `${this.logFile}.1`);
  }
}

/**
 * Structured logger that emits JSON lines on a stream (stdout unless told
 * otherwise) and optionally mirrors them to a file.
 */
export class StructuredLogger {
  private readonly stream: LogStream;
  private readonly level: LogLevel;
  private readonly entryListener?: (entry: LogEntry) => void;
  private readonly bindings: Record<string, unknown>;
  private sink: LogFileSink | null;

  constructor(options: LoggerOptions = {}) {
    this.stream = options.stream ?? process.stdout;
    this.level = options.level ?? "debug";
    this.entryListener = options.onEntry;
    this.bindings = options.bindings ?? {};
    this.sink = options.logFile
      ? new LogFileSink(
          options.logFile,
          options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE,
          Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT),
        )
      : null;
  }

  /**
   * Returns a logger sharing this one's stream, level, listener and file sink
   * whose payloads carry the extra bindings.
   */
  child(bindings: Record<string, unknown>): StructuredLogger {
    const child = new StructuredLogger({
      stream: this.stream,
      level: this.level,
      onEntry: this.entryListener,
      bindings: { ...this.bindings, ...bindings },
    });
    child.sink = this.sink;
    return child;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  /**
   * Waits for all pending log writes to be flushed. Tests rely on this helper
   * to deterministically assert the content of mirrored log files.
   */
  async flush(): Promise<void> {
    await this.sink?.flush();
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const enriched = this.bind(payload);
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(enriched !== undefined ? { payload: enriched } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.stream.write(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
    this.sink?.write(line);
  }

  private bind(payload: unknown): unknown {
    if (Object.keys(this.bindings).length === 0) {
      return payload;
    }
    if (payload === undefined) {
      return { ...this.bindings };
    }
    if (payload && typeof payload === "object" && !Array.isArray(payload)) {
      return { ...this.bindings, ...payload };
    }
    return { ...this.bindings, value: payload };
  }
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
