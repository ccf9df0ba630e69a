/**
 * Structured logger shared by bundle loading, sources and the CLI.
 *
 * Environment:
 *   NLS_LOG_LEVEL = debug|info|warn|error (default: info)
 *   NLS_LOG_JSON  = 1 (JSONL output, default: text)
 */

import { SystemClock, type Clock } from "../runtime/clock.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogData = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogSink {
  write(level: LogLevel, line: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  sink?: LogSink;
  clock?: Clock;
}

export interface Logger {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
  child(component: string): Logger;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function resolveLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : "info";
}

export const stdioSink: LogSink = {
  write(level, line) {
    if (level === "warn" || level === "error") {
      process.stderr.write(`${line}\n`);
      return;
    }
    process.stdout.write(`${line}\n`);
  },
};

export const stderrSink: LogSink = {
  write(_level, line) {
    process.stderr.write(`${line}\n`);
  },
};

export const noopSink: LogSink = {
  write() {},
};

interface ResolvedLoggerOptions {
  level: LogLevel;
  json: boolean;
  sink: LogSink;
  clock: Clock;
}

function formatLine(
  options: ResolvedLoggerOptions,
  level: LogLevel,
  component: string,
  msg: string,
  data?: LogData,
): string {
  const ts = options.clock.nowIso();

  if (options.json) {
    return JSON.stringify({
      ts,
      level,
      component,
      msg,
      ...(data !== undefined ? { data } : {}),
    });
  }

  const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]`;
  return data !== undefined
    ? `${prefix} ${msg} ${JSON.stringify(data)}`
    : `${prefix} ${msg}`;
}

function buildLogger(component: string, options: ResolvedLoggerOptions): Logger {
  const emit = (level: LogLevel, msg: string, data?: LogData): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[options.level]) return;
    options.sink.write(level, formatLine(options, level, component, msg, data));
  };

  return {
    debug: (msg, data) => emit("debug", msg, data),
    info: (msg, data) => emit("info", msg, data),
    warn: (msg, data) => emit("warn", msg, data),
    error: (msg, data) => emit("error", msg, data),
    child: (sub) => buildLogger(`${component}:${sub}`, options),
  };
}

export function createLogger(
  component: string,
  options: LoggerOptions = {},
): Logger {
  return buildLogger(component, {
    level: options.level ?? resolveLogLevel(process.env.NLS_LOG_LEVEL),
    json: options.json ?? process.env.NLS_LOG_JSON === "1",
    sink: options.sink ?? stdioSink,
    clock: options.clock ?? new SystemClock(),
  });
}

export function createSilentLogger(): Logger {
  return createLogger("silent", { sink: noopSink });
}
