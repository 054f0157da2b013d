import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export type LogFormat = "text" | "json";
export const LOG_FORMATS: LogFormat[] = ["text", "json"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  ts: number;
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: Record<string, unknown>;
}

export interface Logger {
  child(scope: string): Logger;
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  scope?: string;
  sink?: LogSink;
  clock?: () => number;
  minLevel?: LogLevel;
}

function stringifyMeta(meta: Record<string, unknown>): string {
  try {
    return JSON.stringify(meta);
  } catch {
    // cycles, bigint
    return inspect(meta, { depth: 4, breakLength: Infinity });
  }
}

/**
 * One line per entry. `text` is for terminals; `json` is one object per line
 * with the meta fields inlined, for log shippers.
 */
export function formatEntry(entry: LogEntry, format: LogFormat): string {
  const time = new Date(entry.ts).toISOString();
  if (format === "json") {
    const line = {
      time,
      level: entry.level,
      ...(entry.scope ? { scope: entry.scope } : {}),
      msg: entry.message,
      ...entry.meta,
    };
    try {
      return JSON.stringify(line);
    } catch {
      return JSON.stringify({
        time,
        level: entry.level,
        msg: entry.message,
        meta: inspect(entry.meta, { depth: 4, breakLength: Infinity }),
      });
    }
  }
  const scope = entry.scope ? ` [${entry.scope}]` : "";
  const meta = entry.meta ? ` ${stringifyMeta(entry.meta)}` : "";
  return `${time} ${entry.level.toUpperCase().padEnd(5)}${scope} ${entry.message}${meta}`;
}

export class StructuredLogger implements Logger {
  private readonly sink: LogSink;
  private readonly clock: () => number;
  private readonly scope?: string;
  private readonly minLevel: LogLevel;

  constructor({ scope, sink, clock, minLevel }: LoggerOptions = {}) {
    this.scope = scope;
    this.sink = sink ?? (() => {});
    this.clock = clock ?? Date.now;
    this.minLevel = minLevel ?? "debug";
  }

  child(scope: string): Logger {
    return new StructuredLogger({
      scope: this.scope ? `${this.scope}.${scope}` : scope,
      sink: this.sink,
      clock: this.clock,
      minLevel: this.minLevel,
    });
  }

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;
    this.sink({
      ts: this.clock(),
      level,
      scope: this.scope,
      message,
      meta: meta && Object.keys(meta).length ? meta : undefined,
    });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return levelAtOrAbove(this.minLevel, level);
  }
}

export class NullLogger implements Logger {
  child(): Logger {
    return this;
  }
  log(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  isLevelEnabled(): boolean {
    return false;
  }
}

// stdout carries command output, so logs go to stderr
export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "info", format: LogFormat = "text") {
    super({
      minLevel,
      sink: (entry) => {
        process.stderr.write(`${formatEntry(entry, format)}\n`);
      },
    });
  }
}

// keeps every entry in memory; used by tests to assert on warnings
export class MemoryLogger extends StructuredLogger {
  readonly entries: LogEntry[];

  constructor(entries: LogEntry[] = [], minLevel: LogLevel = "debug") {
    super({ sink: (entry) => entries.push(entry), minLevel });
    this.entries = entries;
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((e) => !level || e.level === level)
      .map((e) => e.message);
  }
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  return LOG_LEVELS.find((lvl) => lvl === normalized) ?? fallback;
}

export function parseLogFormat(
  raw: string | undefined,
  fallback: LogFormat = "text",
): LogFormat {
  const normalized = raw?.trim().toLowerCase();
  return LOG_FORMATS.find((f) => f === normalized) ?? fallback;
}

export function levelAtOrAbove(
  desired: LogLevel,
  candidate: LogLevel,
): boolean {
  return LEVEL_ORDER[candidate] >= LEVEL_ORDER[desired];
}
