import { describe, it, expect } from '@jest/globals';
import {
  AlreadyLinkedError,
  BackupError,
  CopyError,
  LinkCreationError,
  NoBackupAvailableError,
  RemovalError,
  SaveLinkerError,
  ValidationError,
  describeError,
  exitCodeForKind,
  getExitCode,
} from './errors.js';

describe('errors', () => {
  it('should give every error a stable exit code', () => {
    expect(new ValidationError('x').code).toBe(1);
    expect(new AlreadyLinkedError('/s').code).toBe(2);
    expect(new CopyError('x').code).toBe(3);
    expect(new BackupError('x').code).toBe(4);
    expect(new RemovalError('x').code).toBe(5);
    expect(new LinkCreationError('x').code).toBe(6);
    expect(NoBackupAvailableError.fromMissingHandle().code).toBe(7);
    expect(exitCodeForKind('LinkCreationError')).toBe(6);
  });

  it('should keep instanceof working for subclasses and the base', () => {
    const error = RemovalError.fromNative('/game/Saves', new Error('EBUSY: resource busy'));

    expect(error).toBeInstanceOf(RemovalError);
    expect(error).toBeInstanceOf(SaveLinkerError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('RemovalError');
  });

  it('should carry the native text in message and details', () => {
    const error = LinkCreationError.fromNative('junction', 'C:\\Saves', 'Access is denied.');

    expect(error.message).toBe('Failed to create junction at C:\\Saves: Access is denied.');
    expect(error.details).toBe('Access is denied.');
    expect(error.describe()).toBe('[create-link] Failed to create junction at C:\\Saves: Access is denied.');
  });

  it('should describe and map unknown errors', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('text')).toBe('text');
    expect(getExitCode(new Error('boom'))).toBe(1);
    expect(getExitCode(new BackupError('x'))).toBe(4);
  });
});
