/**
 * Standardized error taxonomy with stable exit codes
 * Each error class extends Error and provides:
 * - code: stable exit code (1-7)
 * - kind: stable name surfaced in OperationResult.errorKind
 * - stage: workflow stage the failure happened in
 * - details: optional verbose details (usually the native OS error text)
 */

import { getLogger } from './logger.js';

export type ErrorKind =
  | 'ValidationError'
  | 'AlreadyLinkedError'
  | 'CopyError'
  | 'BackupError'
  | 'RemovalError'
  | 'LinkCreationError'
  | 'NoBackupAvailableError';

/**
 * Stable process exit code per error kind
 */
export const EXIT_CODES: Record<ErrorKind, number> = {
  ValidationError: 1,
  AlreadyLinkedError: 2,
  CopyError: 3,
  BackupError: 4,
  RemovalError: 5,
  LinkCreationError: 6,
  NoBackupAvailableError: 7,
};

export function exitCodeForKind(kind: ErrorKind): number {
  return EXIT_CODES[kind];
}

/**
 * Extract the native message of anything thrown
 */
export function nativeMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Base error class with exit code
 */
export abstract class SaveLinkerError extends Error {
  abstract readonly code: number;
  abstract readonly kind: ErrorKind;
  readonly stage: string;
  readonly details?: string;

  constructor(stage: string, message: string, details?: string) {
    super(message);
    this.name = this.constructor.name;
    this.stage = stage;
    this.details = details;
    Object.setPrototypeOf(this, SaveLinkerError.prototype);
  }

  /**
   * Get the exit code for this error
   */
  getExitCode(): number {
    return this.code;
  }

  /**
   * Message prefixed with the workflow stage label
   */
  describe(): string {
    return `[${this.stage}] ${this.message}`;
  }

  /**
   * Log error with appropriate level
   */
  log(): void {
    const logger = getLogger();
    logger.error(this.describe());
    if (this.details) {
      logger.debug(`Details: ${this.details}`);
    }
  }
}

/**
 * Invalid input paths (exit code 1)
 * Reported before any filesystem mutation
 */
export class ValidationError extends SaveLinkerError {
  readonly code = EXIT_CODES.ValidationError;
  readonly kind = 'ValidationError';

  constructor(message: string, details?: string) {
    super('validate', message, details);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  static fromMissingDirectory(label: string, path: string): ValidationError {
    return new ValidationError(
      `${label} does not exist: ${path}`,
      `Check the path and make sure the folder has been created`
    );
  }

  static fromNotADirectory(label: string, path: string): ValidationError {
    return new ValidationError(`${label} is not a directory: ${path}`);
  }

  static fromOverlap(saveDir: string, cloudTarget: string): ValidationError {
    return new ValidationError(
      `Save folder and cloud folder overlap: ${saveDir} <-> ${cloudTarget}`,
      'The cloud target must not be the save folder itself or live inside it (or the other way round)'
    );
  }

  static fromBackupRootInside(saveDir: string, backupRoot: string): ValidationError {
    return new ValidationError(
      `Backup root must be outside the save folder: ${backupRoot} (save folder: ${saveDir})`
    );
  }

  static fromBackupOverlap(saveDir: string, backupPath: string): ValidationError {
    return new ValidationError(
      `Backup and save folder overlap: ${backupPath} <-> ${saveDir}`,
      'Restoring would delete the backup together with the save folder'
    );
  }
}

/**
 * Link workflow precondition (exit code 2)
 */
export class AlreadyLinkedError extends SaveLinkerError {
  readonly code = EXIT_CODES.AlreadyLinkedError;
  readonly kind = 'AlreadyLinkedError';

  constructor(saveDir: string) {
    super(
      'check-link',
      `The save folder is already a link/junction: ${saveDir}. Use restore first.`
    );
    Object.setPrototypeOf(this, AlreadyLinkedError.prototype);
  }
}

/**
 * Copy failure (exit code 3)
 */
export class CopyError extends SaveLinkerError {
  readonly code = EXIT_CODES.CopyError;
  readonly kind = 'CopyError';

  constructor(message: string, details?: string) {
    super('copy', message, details);
    Object.setPrototypeOf(this, CopyError.prototype);
  }

  static fromNative(src: string, dst: string, error: unknown): CopyError {
    const native = nativeMessage(error);
    return new CopyError(`Failed to copy ${src} to ${dst}: ${native}`, native);
  }
}

/**
 * Backup failure (exit code 4)
 */
export class BackupError extends SaveLinkerError {
  readonly code = EXIT_CODES.BackupError;
  readonly kind = 'BackupError';

  constructor(message: string, details?: string) {
    super('backup', message, details);
    Object.setPrototypeOf(this, BackupError.prototype);
  }

  static fromNative(src: string, backupRoot: string, error: unknown): BackupError {
    const native = nativeMessage(error);
    return new BackupError(`Failed to back up ${src} into ${backupRoot}: ${native}`, native);
  }
}

/**
 * Removal failure (exit code 5)
 */
export class RemovalError extends SaveLinkerError {
  readonly code = EXIT_CODES.RemovalError;
  readonly kind = 'RemovalError';

  constructor(message: string, details?: string) {
    super('remove', message, details);
    Object.setPrototypeOf(this, RemovalError.prototype);
  }

  static fromNative(path: string, error: unknown): RemovalError {
    const native = nativeMessage(error);
    return new RemovalError(`Failed to remove ${path}: ${native}`, native);
  }
}

/**
 * Link creation failure (exit code 6)
 * The message always carries the native diagnostic text
 */
export class LinkCreationError extends SaveLinkerError {
  readonly code = EXIT_CODES.LinkCreationError;
  readonly kind = 'LinkCreationError';

  constructor(message: string, details?: string) {
    super('create-link', message, details);
    Object.setPrototypeOf(this, LinkCreationError.prototype);
  }

  static fromNative(variant: 'symlink' | 'junction', linkPath: string, native: string): LinkCreationError {
    return new LinkCreationError(`Failed to create ${variant} at ${linkPath}: ${native}`, native);
  }
}

/**
 * Restore workflow precondition (exit code 7)
 */
export class NoBackupAvailableError extends SaveLinkerError {
  readonly code = EXIT_CODES.NoBackupAvailableError;
  readonly kind = 'NoBackupAvailableError';

  constructor(message: string, details?: string) {
    super('validate-backup', message, details);
    Object.setPrototypeOf(this, NoBackupAvailableError.prototype);
  }

  static fromMissingHandle(): NoBackupAvailableError {
    return new NoBackupAvailableError(
      'No backup available. Backup path not set and no backup recorded for this save folder.',
      'Run link first, or pass a backup path explicitly'
    );
  }

  static fromMissingDirectory(backupPath: string): NoBackupAvailableError {
    return new NoBackupAvailableError(`Backup directory no longer exists: ${backupPath}`);
  }
}

/**
 * Map error to exit code
 */
export function getExitCode(error: unknown): number {
  if (error instanceof SaveLinkerError) {
    return error.getExitCode();
  }
  // Default to 1 for unknown errors
  return 1;
}

/**
 * User-facing text for any thrown value: stage label plus native text
 */
export function describeError(error: unknown): string {
  if (error instanceof SaveLinkerError) {
    return error.describe();
  }
  return nativeMessage(error);
}
