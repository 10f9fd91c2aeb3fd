/**
 * Error handling helpers
 */

import { logger } from './logger.js';
import { jsonError, outputJson } from '../utils/json-output.js';

export type ErrorCode =
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'IO_ERROR'
  | 'INVALID_PATH'
  | 'CONFIG_ERROR';

export class CommentRatioError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
  ) {
    super(message);
    this.name = 'CommentRatioError';
  }
}

export class FileNotFoundError extends CommentRatioError {
  constructor(filePath: string) {
    super(`File not found: ${filePath}`, 'NOT_FOUND');
    this.name = 'FileNotFoundError';
  }
}

export class PermissionDeniedError extends CommentRatioError {
  constructor(filePath: string) {
    super(`Permission denied: ${filePath}`, 'PERMISSION_DENIED');
    this.name = 'PermissionDeniedError';
  }
}

export class FileReadError extends CommentRatioError {
  constructor(filePath: string, cause: string) {
    super(`Error reading file ${filePath}: ${cause}`, 'IO_ERROR');
    this.name = 'FileReadError';
  }
}

export class InvalidPathError extends CommentRatioError {
  constructor(targetPath: string) {
    super(`Invalid path: ${targetPath}`, 'INVALID_PATH');
    this.name = 'InvalidPathError';
  }
}

export class ConfigError extends CommentRatioError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Errors raised by fs may come from another realm, so `instanceof Error` is not reliable.
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    if (typeof error.message === 'string') return error.message;
  }
  return String(error);
}

/**
 * Map a failed read of `filePath` onto one of the read error kinds.
 */
export function toReadError(error: unknown, filePath: string): CommentRatioError {
  if (error instanceof CommentRatioError) return error;
  if (isErrnoException(error)) {
    if (error.code === 'ENOENT') return new FileNotFoundError(filePath);
    if (error.code === 'EACCES' || error.code === 'EPERM') {
      return new PermissionDeniedError(filePath);
    }
  }
  return new FileReadError(filePath, errorMessage(error));
}

export function failCommand(message: string, error?: unknown, exitCode: number = 1): void {
  logger.error(message);
  if (error) {
    logger.error(errorMessage(error));
  }
  process.exitCode = exitCode;
}

function extractJsonMode(args: unknown[]): boolean {
  for (let i = args.length - 1; i >= 0; i -= 1) {
    const candidate = args[i];
    if (!candidate || typeof candidate !== 'object') continue;
    if ('json' in candidate && typeof candidate.json === 'boolean') {
      return candidate.json;
    }
  }
  return false;
}

export function emitCliJsonError(command: string, error: unknown): void {
  outputJson(jsonError(errorMessage(error), command));
  process.exitCode = 1;
}

export function withCliErrorHandling<TArgs extends unknown[]>(
  command: string,
  handler: (...args: TArgs) => Promise<void> | void,
): (...args: TArgs) => Promise<void> {
  return async (...args: TArgs): Promise<void> => {
    try {
      await handler(...args);
    } catch (error) {
      if (extractJsonMode(args)) {
        emitCliJsonError(command, error);
        return;
      }
      if (error instanceof CommentRatioError) {
        failCommand(error.message);
        return;
      }
      failCommand(`Command "${command}" failed`, error);
    }
  };
}
