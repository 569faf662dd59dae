import type { LogContext, Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogLevelName = "debug" | "info" | "warn" | "error";

const LEVEL_NAMES: Record<LogLevel, LogLevelName> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel | LogLevelName;
  component?: string;
}

/**
 * JSON-lines logger. One object per record with `time`, `level`, `msg`, an
 * optional `component`, and the context fields flattened alongside.
 */
export class StructuredLogger implements Logger {
  private readonly writer: (line: string) => void;
  private readonly level: LogLevel;
  private readonly component: string | undefined;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level =
      typeof options.level === "string"
        ? (LEVELS_BY_NAME[options.level] ?? LogLevel.INFO)
        : (options.level ?? LogLevel.INFO);
    this.component = options.component;
  }

  /** Same writer and level, tagged with another component name. */
  child(component: string): StructuredLogger {
    return new StructuredLogger({ writer: this.writer, level: this.level, component });
  }

  debug(msg: string, ctx?: LogContext): void {
    this.emit(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: LogContext): void {
    this.emit(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: LogContext): void {
    this.emit(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: LogContext): void {
    this.emit(LogLevel.ERROR, msg, ctx);
  }

  private emit(level: LogLevel, msg: string, ctx?: LogContext): void {
    if (level < this.level) return;

    const entry: LogContext = {};
    if (ctx) {
      for (const [key, value] of Object.entries(ctx)) {
        if (value instanceof Error) {
          entry[key] = value.message;
          entry[`${key}Code`] = "code" in value ? value.code : undefined;
        } else {
          entry[key] = value;
        }
      }
    }

    // Reserved fields are written last so context cannot shadow them.
    entry.time = new Date().toISOString();
    entry.level = LEVEL_NAMES[level];
    entry.msg = msg;
    if (this.component) entry.component = this.component;

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch {
      line = JSON.stringify({ time: entry.time, level: entry.level, msg, serializationError: true });
    }
    this.writer(line);
  }
}
