import { Schema } from "effect";

export const LogLevel = Schema.Literal("debug", "info", "warn", "error", "silent");
export type LogLevel = typeof LogLevel.Type;

type EmitLevel = Exclude<LogLevel, "silent">;

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogFields = Record<string, unknown>;

export type LogSink = (level: EmitLevel, ...args: unknown[]) => void;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

const consoleSink: LogSink = (level, ...args) => {
  console[level](...args);
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = SEVERITY[options.level ?? "info"];
  const sink = options.sink ?? consoleSink;

  function emit(level: EmitLevel, message: string, fields?: LogFields) {
    if (SEVERITY[level] < threshold) return;
    if (fields === undefined) {
      sink(level, `[${level}]`, message);
    } else {
      sink(level, `[${level}]`, message, fields);
    }
  }

  return {
    debug: (message, fields) => emit("debug", message, fields),
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields),
  };
}
