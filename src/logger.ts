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
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export type LogSink = (entry: LogEntry) => void;
type EchoWriter = (entry: LogEntry) => void;

export interface LoggerOptions {
  scope?: string;
  sink?: LogSink;
  minLevel?: LogLevel;
  echo?: boolean;
  writer?: EchoWriter;
  clock?: () => number;
}

function isEchoSuppressed(): boolean {
  const raw = process.env.COUCH_REPLICATE_DISABLE_LOG_ECHO;
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  if (!normalized) return false;
  return normalized !== "0" && normalized !== "false";
}

function serializeMeta(meta: Record<string, unknown>): string {
  try {
    return JSON.stringify(meta);
  } catch {
    return inspect(meta, { depth: 4 });
  }
}

export function formatLogEntry(entry: LogEntry): string {
  const { ts, level, scope, message, meta } = entry;
  const scopeText = scope ? ` [${scope}]` : "";
  const metaText = meta ? ` ${serializeMeta(meta)}` : "";
  return `${new Date(ts).toISOString()} ${level.toUpperCase()}${scopeText} ${message}${metaText}`;
}

// stdout belongs to the progress bar and summary
const stderrWriter: EchoWriter = (entry) => {
  if (isEchoSuppressed()) return;
  console.error(formatLogEntry(entry));
};

export class StructuredLogger implements Logger {
  private readonly sink?: LogSink;
  private readonly minLevel: LogLevel;
  private readonly echo: boolean;
  private readonly writer: EchoWriter;
  private readonly clock: () => number;
  private readonly scope?: string;

  constructor({
    scope,
    sink,
    minLevel = "info",
    echo = false,
    writer,
    clock,
  }: LoggerOptions = {}) {
    this.scope = scope;
    this.sink = sink;
    this.minLevel = minLevel;
    this.echo = echo;
    this.writer = writer ?? stderrWriter;
    this.clock = clock ?? Date.now;
  }

  child(scope: string): Logger {
    return new StructuredLogger({
      scope: this.scope ? `${this.scope}.${scope}` : scope,
      sink: this.sink,
      minLevel: this.minLevel,
      echo: this.echo,
      writer: this.writer,
      clock: this.clock,
    });
  }

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;
    const entry: LogEntry = {
      ts: this.clock(),
      level,
      scope: this.scope,
      message,
      meta: meta && Object.keys(meta).length ? meta : undefined,
    };
    this.sink?.(entry);
    if (this.echo) {
      this.writer(entry);
    }
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
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
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

export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "warn") {
    super({ minLevel, echo: true });
  }
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "warn",
): LogLevel {
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  return match ?? fallback;
}

/**
 * --log-level wins; otherwise -d and -v pick debug and info, and the
 * environment (then "warn") supplies the default.
 */
export function resolveLogLevel(flags: {
  logLevel?: string;
  verbose?: boolean;
  debug?: boolean;
}): LogLevel {
  const fallback = parseLogLevel(process.env.COUCH_REPLICATE_LOG_LEVEL, "warn");
  if (flags.logLevel) return parseLogLevel(flags.logLevel, fallback);
  if (flags.debug) return "debug";
  if (flags.verbose) return "info";
  return fallback;
}
