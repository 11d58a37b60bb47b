/**
 * CLI logger. Created once in cli.ts from --log-level / --log-path /
 * --json-log (or their DBTKIT_* env fallbacks) and passed to whatever
 * needs it; the core modules never log.
 */

import * as fs from "fs";
import * as path from "path";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Append every record to this file as well. */
  file?: string;
  json?: boolean;
  stream?: LogSink;
  now?: () => Date;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((known) => known === value);
}

export class Logger {
  readonly level: LogLevel;
  readonly file?: string;
  readonly json: boolean;
  private stream: LogSink;
  private now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? DEFAULT_LOG_LEVEL;
    this.file = options.file;
    this.json = options.json ?? false;
    this.stream = options.stream ?? process.stderr;
    this.now = options.now ?? (() => new Date());
    if (this.file) fs.mkdirSync(path.dirname(this.file), { recursive: true });
  }

  enabled(level: LogLevel): boolean {
    return RANK[level] >= RANK[this.level];
  }

  debug(msg: string, fields?: Record<string, unknown>): void {
    this.log("debug", msg, fields);
  }

  info(msg: string, fields?: Record<string, unknown>): void {
    this.log("info", msg, fields);
  }

  warn(msg: string, fields?: Record<string, unknown>): void {
    this.log("warn", msg, fields);
  }

  error(msg: string, fields?: Record<string, unknown>): void {
    this.log("error", msg, fields);
  }

  /** Format one record without writing it. */
  format(level: LogLevel, msg: string, fields?: Record<string, unknown>): string {
    const ts = this.now().toISOString();
    if (this.json) return JSON.stringify({ ts, level, msg, ...fields });
    const extra = fields && Object.keys(fields).length ? " " + JSON.stringify(fields) : "";
    return `${ts} ${level.toUpperCase().padEnd(5)} ${msg}${extra}`;
  }

  private log(level: LogLevel, msg: string, fields?: Record<string, unknown>): void {
    if (!this.enabled(level)) return;
    const line = this.format(level, msg, fields) + "\n";
    this.stream.write(line);
    // Synchronous so records survive an immediate process.exit().
    if (this.file) fs.appendFileSync(this.file, line, "utf-8");
  }
}

/** A logger that drops everything, for tests and programmatic callers. */
export function silentLogger(): Logger {
  return new Logger({ level: "error", stream: { write: () => true } });
}
