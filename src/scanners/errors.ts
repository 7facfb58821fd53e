import type { HashPhase } from '../types.js';

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * The scan root is empty, missing, not a directory or cannot be listed.
 * Fatal to a scan; raised before any file is read.
 */
export class InvalidRootError extends Error {
  readonly kind = 'invalid-root';

  constructor(readonly root: string, reason: string) {
    super(`Invalid scan root "${root}": ${reason}`);
    this.name = 'InvalidRootError';
  }
}

/**
 * A single file could not be opened or read while hashing.
 */
export class FileReadError extends Error {
  readonly kind = 'io';
  readonly code: string | undefined;

  constructor(readonly path: string, readonly phase: HashPhase, cause: unknown) {
    super(`Cannot read ${path}: ${errorMessage(cause)}`, { cause });
    this.name = 'FileReadError';
    this.code = errorCode(cause);
  }
}
