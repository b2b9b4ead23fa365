/**
 * Common types and interfaces for the depsolve application
 */

// Configuration types

export interface RepositoryConfig {
  name: string;
  /** Path to a YAML or JSON package index */
  index: string;
  /** 0-100, higher is consulted first */
  priority?: number;
  enabled?: boolean;
}

export interface DepsolveConfig {
  maxDepth?: number;
  includeInstalled?: boolean;
  repositories?: RepositoryConfig[];
  /** Path to the installed-packages database (same format as a package index) */
  installed?: string;
}

// Command option types

export interface ReportOptions {
  json?: boolean;
  config?: string;
}

export interface OrderOptions {
  installed?: boolean;
  config?: string;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class DepsolveError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DepsolveError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  INVALID_CONSTRAINT = 'INVALID_CONSTRAINT',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
