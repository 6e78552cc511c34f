// src/logger.ts
//
// Diagnostics only. stdout belongs to the hash lines in output.ts, so the
// console logger writes to stderr.

import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

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
  /** Entries below this level are dropped. Default: everything passes. */
  minLevel?: LogLevel;
  clock?: () => number;
}

export function levelAtOrAbove(
  desired: LogLevel,
  candidate: LogLevel,
): boolean {
  return LEVEL_ORDER[candidate] >= LEVEL_ORDER[desired];
}

function serializeMeta(meta: Record<string, unknown>): string {
  try {
    return JSON.stringify(meta);
  } catch {
    return inspect(meta, { depth: 4 });
  }
}

/** `WARN [walk] message {"path":"/x"}` */
export function formatEntry({ level, scope, message, meta }: LogEntry): string {
  const parts = [level.toUpperCase().padEnd(5)];
  if (scope) parts.push(`[${scope}]`);
  parts.push(message);
  if (meta) parts.push(serializeMeta(meta));
  return parts.join(" ");
}

export class StructuredLogger implements Logger {
  private readonly scope?: string;
  private readonly sink: LogSink;
  private readonly minLevel: LogLevel;
  private readonly clock: () => number;

  constructor({ scope, sink, minLevel, clock }: LoggerOptions = {}) {
    this.scope = scope;
    this.sink = sink ?? (() => {});
    this.minLevel = minLevel ?? "debug";
    this.clock = clock ?? Date.now;
  }

  child(scope: string): Logger {
    return new StructuredLogger({
      scope: this.scope ? `${this.scope}.${scope}` : scope,
      sink: this.sink,
      minLevel: this.minLevel,
      clock: this.clock,
    });
  }

  private log(
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>,
  ): void {
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

export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "warn") {
    super({
      minLevel,
      sink: (entry) => {
        console.error(formatEntry(entry));
      },
    });
  }
}

export class NullLogger implements Logger {
  child(): Logger {
    return this;
  }
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  isLevelEnabled(): boolean {
    return false;
  }
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((lvl) => lvl === value);
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}
