/**
 * Common types and interfaces for the depprobe CLI application
 */

// Re-export solver data model
export * from './solver.js';

// Core application types
export interface DepprobeDirectories {
  config: string;
  /** Scratch space, including the probe virtualenv */
  runtime: string;
}

export interface DepprobeConfig {
  /** Package indices to resolve against, in priority order */
  indexUrls?: string[];
  pythonVersion?: PythonVersion;
  /** Seed packages that are never probed */
  excludePackages?: string[];
  transitive?: boolean;
  /** Directory of the virtualenv used as the probe environment */
  environmentDir?: string;
  /** Timeout for a single pip/virtualenv invocation, in milliseconds */
  commandTimeout?: number;
}

export type PythonVersion = 2 | 3;

export type ReportFormat = 'json' | 'yaml';

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class DepprobeError extends Error {
  public code: string;
  public details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'DepprobeError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  PACKAGE_NOT_FOUND = 'PACKAGE_NOT_FOUND',
  COMMAND_FAILED = 'COMMAND_FAILED',
  INDEX_REQUEST_FAILED = 'INDEX_REQUEST_FAILED',
  INVALID_REQUIREMENT = 'INVALID_REQUIREMENT',
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
