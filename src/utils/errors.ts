/**
 * Error taxonomy for site generation
 * Each error class extends TreeSiteError and provides:
 * - message: user-facing summary
 * - details: optional verbose details
 *
 * Every failure ends the process with exit code 1; the classes only separate
 * where the failure came from.
 */

import { getLogger } from './logger.js';

export const EXIT_FAILURE = 1;

/**
 * Base error class
 */
export abstract class TreeSiteError extends Error {
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
    Object.setPrototypeOf(this, TreeSiteError.prototype);
  }

  /**
   * Log error with appropriate level
   */
  log(): void {
    const logger = getLogger();
    logger.error(this.message);
    if (this.details) {
      logger.debug(`Details: ${this.details}`);
    }
  }
}

/**
 * Invalid command-line input
 */
export class InvalidInputError extends TreeSiteError {
  constructor(message: string, details?: string) {
    super(message, details);
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }

  static fromEmptyPath(flag: string): InvalidInputError {
    return new InvalidInputError(
      `${flag} must not be empty`,
      `Pass a file or directory path after ${flag}`
    );
  }
}

/**
 * Tree file that cannot be read or does not describe a binary tree
 */
export class InvalidTreeError extends TreeSiteError {
  /** JSON path of the offending node, e.g. "$.left.right" */
  readonly location?: string;

  constructor(message: string, location?: string, details?: string) {
    super(message, details);
    this.location = location;
    Object.setPrototypeOf(this, InvalidTreeError.prototype);
  }

  static fromShape(location: string, reason: string): InvalidTreeError {
    return new InvalidTreeError(`Invalid tree node at ${location}: ${reason}`, location);
  }

  static fromUnparsable(file: string, reason: string): InvalidTreeError {
    return new InvalidTreeError(
      `Tree file is not valid JSON: ${file}`,
      undefined,
      `Parse error: ${reason}`
    );
  }

  static fromUnreadable(file: string, reason: string): InvalidTreeError {
    return new InvalidTreeError(`Cannot read tree file: ${file}`, undefined, reason);
  }
}

/**
 * Directory creation or file write failure during generation
 */
export class SiteWriteError extends TreeSiteError {
  readonly path: string;
  /** errno code of the underlying failure, when there is one */
  readonly errno?: string;

  constructor(message: string, path: string, errno?: string, details?: string) {
    super(message, details);
    this.path = path;
    this.errno = errno;
    Object.setPrototypeOf(this, SiteWriteError.prototype);
  }

  static fromPermissionDenied(path: string, errno: string): SiteWriteError {
    return new SiteWriteError(
      `Permission denied writing to: ${path}`,
      path,
      errno,
      'Check directory permissions and ensure the output path is writable'
    );
  }

  static fromDiskSpace(path: string): SiteWriteError {
    return new SiteWriteError(
      `Insufficient disk space to write: ${path}`,
      path,
      'ENOSPC',
      'Free up disk space and run the generator again'
    );
  }

  static fromIoFailure(path: string, reason: string, errno?: string): SiteWriteError {
    return new SiteWriteError(`Failed to write ${path}: ${reason}`, path, errno);
  }

  /**
   * Classify a filesystem error thrown while writing `path`
   */
  static fromFsError(path: string, error: unknown): SiteWriteError {
    if (error instanceof SiteWriteError) {
      return error;
    }

    const errno = getErrnoCode(error);
    if (errno === 'EACCES' || errno === 'EPERM' || errno === 'EROFS') {
      return SiteWriteError.fromPermissionDenied(path, errno);
    }
    if (errno === 'ENOSPC') {
      return SiteWriteError.fromDiskSpace(path);
    }

    const reason = error instanceof Error ? error.message : String(error);
    return SiteWriteError.fromIoFailure(path, reason, errno);
  }
}

/**
 * Extract the errno code (e.g. "ENOENT") from a Node.js system error
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Log error, then exit with the failure code
 */
export function handleError(error: unknown): never {
  if (error instanceof TreeSiteError) {
    error.log();
    process.exit(EXIT_FAILURE);
  }

  const logger = getLogger();
  if (error instanceof Error) {
    logger.error(`Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.debug(`Stack: ${error.stack}`);
    }
  } else {
    logger.error(`Unexpected error: ${String(error)}`);
  }
  process.exit(EXIT_FAILURE);
}
