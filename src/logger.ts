import { inspect } from "node:util";
import { ENV_DISABLE_LOG_ECHO } from "./constants.js";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogMeta = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: LogMeta;
}

export interface Logger {
  child(scope: string): Logger;
  log(level: LogLevel, message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export type LogWriter = (line: string) => void;

export interface LoggerOptions {
  scope?: string;
  writer?: LogWriter;
}

function isEchoSuppressed(): boolean {
  const raw = process.env[ENV_DISABLE_LOG_ECHO];
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  if (!normalized) return false;
  return normalized !== "0" && normalized !== "false";
}

const stderrWriter: LogWriter = (line) => {
  if (isEchoSuppressed()) return;
  console.error(line);
};

function toSerializable(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function serializeMeta(meta: LogMeta): string {
  const plain: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    plain[key] = toSerializable(value);
  }
  try {
    return JSON.stringify(plain);
  } catch {
    return inspect(plain, { depth: 4 });
  }
}

export function formatLogEntry(entry: LogEntry): string {
  const { level, scope, message, meta } = entry;
  const prefix =
    level === "error"
      ? "⛔"
      : level === "warn"
        ? "⚠️"
        : level === "info"
          ? "ℹ️"
          : "·";
  const scopeText = scope ? `[${scope}] ` : "";
  const metaText = meta ? ` ${serializeMeta(meta)}` : "";
  return `${prefix} ${scopeText}${message}${metaText}`;
}

export function levelAtOrAbove(desired: LogLevel, candidate: LogLevel): boolean {
  return LEVEL_ORDER[candidate] >= LEVEL_ORDER[desired];
}

/**
 * Logger that formats each entry on one line and hands it to a writer
 * (stderr by default) when the entry's level reaches `minLevel`.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly scope?: string;
  private readonly writer: LogWriter;

  constructor(minLevel: LogLevel = "info", opts: LoggerOptions = {}) {
    this.minLevel = minLevel;
    this.scope = opts.scope;
    this.writer = opts.writer ?? stderrWriter;
  }

  child(scope: string): Logger {
    return new ConsoleLogger(this.minLevel, {
      scope: this.scope ? `${this.scope}.${scope}` : scope,
      writer: this.writer,
    });
  }

  log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!this.isLevelEnabled(level)) return;
    this.writer(
      formatLogEntry({
        level,
        scope: this.scope,
        message,
        meta: meta && Object.keys(meta).length ? meta : undefined,
      }),
    );
  }

  debug(message: string, meta?: LogMeta): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: LogMeta): void {
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
