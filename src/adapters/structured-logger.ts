import type { Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

const RESERVED_KEYS = new Set(["time", "level", "msg", "component"]);

/** Parse a level name such as "warn" (case-insensitive). Unknown names yield undefined. */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  switch (name?.trim().toLowerCase()) {
    case "debug":
      return LogLevel.DEBUG;
    case "info":
      return LogLevel.INFO;
    case "warn":
    case "warning":
      return LogLevel.WARN;
    case "error":
      return LogLevel.ERROR;
    default:
      return undefined;
  }
}

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  component?: string;
  /** Fields stamped on every line, e.g. the gateway address. */
  bindings?: Record<string, unknown>;
}

/** Emits one JSON object per line (stderr by default). */
export class StructuredLogger implements Logger {
  private readonly writer: (line: string) => void;
  private readonly level: LogLevel;
  private readonly component: string | undefined;
  private readonly bindings: Record<string, unknown>;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.INFO;
    this.component = options.component;
    this.bindings = options.bindings ?? {};
  }

  /** Derive a logger for a sub-component sharing this one's writer, level and bindings. */
  child(component: string, bindings: Record<string, unknown> = {}): StructuredLogger {
    return new StructuredLogger({
      writer: this.writer,
      level: this.level,
      component: this.component ? `${this.component}.${component}` : component,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, msg, ctx);
  }

  private emit(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (level < this.level) return;

    const entry: Record<string, unknown> = {};
    for (const source of [this.bindings, ctx ?? {}]) {
      for (const [key, value] of Object.entries(source)) {
        if (RESERVED_KEYS.has(key)) continue;
        if (value instanceof Error) {
          entry[key] = value.message;
          entry[`${key}Stack`] = value.stack;
        } else {
          entry[key] = value;
        }
      }
    }

    const time = new Date().toISOString();
    const header: Record<string, unknown> = { time, level: LEVEL_NAMES[level], msg };
    if (this.component) header.component = this.component;

    try {
      this.writer(JSON.stringify({ ...header, ...entry }));
    } catch {
      // circular ctx
      this.writer(JSON.stringify({ ...header, serializationError: true }));
    }
  }
}
