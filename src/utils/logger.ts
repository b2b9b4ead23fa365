import { type Logger, LogLevel } from '../types/index.js';

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  /** Receives each formatted line. Defaults to stderr, so stdout carries only command output. */
  sink?: LogSink;
  /** Timestamp source */
  now?: () => Date;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return Object.values(LogLevel).find(level => level === normalized);
}

/**
 * `DEPSOLVE_LOG_LEVEL` wins, then `DEPSOLVE_VERBOSE=1` (debug), then
 * `NODE_ENV=development` (info). Otherwise only errors are logged.
 */
export function logLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const explicit = parseLogLevel(env.DEPSOLVE_LOG_LEVEL);
  if (explicit) return explicit;
  if (env.DEPSOLVE_VERBOSE === '1') return LogLevel.DEBUG;
  if (env.NODE_ENV === 'development') return LogLevel.INFO;
  return LogLevel.ERROR;
}

function describeMeta(meta: unknown): string {
  if (meta === undefined || meta === null || meta === '') return '';
  if (typeof meta !== 'object') return ` ${String(meta)}`;

  // Error fields are not enumerable
  return ` ${JSON.stringify(meta, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message, stack: value.stack } : value
  )}`;
}

export class DepsolveLogger implements Logger {
  private level: LogLevel;
  private readonly sink: LogSink;
  private readonly now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.sink = options.sink ?? (line => process.stderr.write(`${line}\n`));
    this.now = options.now ?? (() => new Date());
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  debug(message: string, meta?: unknown): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log(LogLevel.ERROR, message, meta);
  }

  private log(level: LogLevel, message: string, meta: unknown): void {
    if (!this.isEnabled(level)) return;
    const tag = `depsolve:${level}`.padEnd(14);
    this.sink(`${this.now().toISOString()} ${tag} ${message}${describeMeta(meta)}`);
  }
}

export const logger = new DepsolveLogger({ level: logLevelFromEnv() });
