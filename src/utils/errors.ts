import { DepprobeError, ErrorCodes, type CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for different types of errors in the depprobe CLI
 */

export class PackageNotFoundError extends DepprobeError {
  constructor(packageName: string, indexUrl?: string) {
    super(
      `Package '${packageName}' not found${indexUrl ? ` on ${indexUrl}` : ''}`,
      ErrorCodes.PACKAGE_NOT_FOUND,
      { packageName, indexUrl }
    );
    this.name = 'PackageNotFoundError';
  }
}

export class RequirementParseError extends DepprobeError {
  constructor(requirement: string, reason: string) {
    super(`Invalid requirement '${requirement}': ${reason}`, ErrorCodes.INVALID_REQUIREMENT, { requirement, reason });
    this.name = 'RequirementParseError';
  }
}

export class IndexRequestError extends DepprobeError {
  constructor(url: string, status: number | undefined, reason: string) {
    super(`Request to ${url} failed: ${reason}`, ErrorCodes.INDEX_REQUEST_FAILED, { url, status });
    this.name = 'IndexRequestError';
  }
}

export class FileSystemError extends DepprobeError {
  constructor(message: string, details?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends DepprobeError {
  constructor(message: string, details?: unknown) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends DepprobeError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof DepprobeError) {
    // For CLI UX, avoid noisy error logs by default; surface details only in verbose mode
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
