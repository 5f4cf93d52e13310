import type { ValueOf } from '../types/value-of';
import type { EncodingAttempt } from './encoding';

export const ERROR_CODE = {
  INVALID_COMPOSITION: 'INVALID_COMPOSITION',
  WILDCARD_NOT_ALLOWED: 'WILDCARD_NOT_ALLOWED',
  NOT_A_DIRECTORY_PATH: 'NOT_A_DIRECTORY_PATH',
  ENCODING: 'ENCODING',
  WRITE_PERMISSION: 'WRITE_PERMISSION',
  DIRECTORY_NOT_FOUND: 'DIRECTORY_NOT_FOUND',
  INVALID_OPTION: 'INVALID_OPTION',
  FILE_EXISTS: 'FILE_EXISTS',
  TEMP_RESOURCE: 'TEMP_RESOURCE',
} as const;

export type ErrorCode = ValueOf<typeof ERROR_CODE>;

/**
 * Base class for every error raised by the toolkit.
 *
 * `recoverable` marks the two kinds a caller may retry once with corrected
 * parameters (encoding override, force-writable). Everything else aborts.
 */
export class FsToolkitError extends Error {
  public constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly recoverable = false,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidCompositionError extends FsToolkitError {
  public constructor(message: string) {
    super(message, ERROR_CODE.INVALID_COMPOSITION);
  }
}

export class WildcardNotAllowedError extends FsToolkitError {
  public constructor(operation: string) {
    super(`Wildcard path is not accepted by ${operation}`, ERROR_CODE.WILDCARD_NOT_ALLOWED);
  }
}

export class NotADirectoryPathError extends FsToolkitError {
  public constructor(message = 'Cannot build a wildcard from a wildcard path') {
    super(message, ERROR_CODE.NOT_A_DIRECTORY_PATH);
  }
}

export class EncodingError extends FsToolkitError {
  public constructor(
    public readonly path: string,
    public readonly attempts: readonly EncodingAttempt[],
    recoverable: boolean,
  ) {
    const tried = attempts.map((attempt) => attempt.encoding).join(', ');
    super(`Could not convert text for ${path} (tried: ${tried})`, ERROR_CODE.ENCODING, recoverable);
  }
}

export class WritePermissionError extends FsToolkitError {
  public constructor(public readonly path: string) {
    super(`File is not writable: ${path}`, ERROR_CODE.WRITE_PERMISSION, true);
  }
}

export class DirectoryNotFoundError extends FsToolkitError {
  public constructor(public readonly path: string) {
    super(`Directory does not exist: ${path}`, ERROR_CODE.DIRECTORY_NOT_FOUND);
  }
}

export class InvalidOptionError extends FsToolkitError {
  public constructor(message: string) {
    super(message, ERROR_CODE.INVALID_OPTION);
  }
}

export class FileExistsError extends FsToolkitError {
  public constructor(public readonly path: string) {
    super(`File already exists: ${path}`, ERROR_CODE.FILE_EXISTS);
  }
}

export class TempResourceError extends FsToolkitError {
  public constructor(message: string) {
    super(message, ERROR_CODE.TEMP_RESOURCE);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
