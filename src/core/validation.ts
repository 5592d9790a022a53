import { realpath } from 'fs/promises';
import { dirname } from 'path';
import { isDirectory, isSameOrInside, pathExists } from '../fs/operations.js';
import { ValidationError } from '../utils/errors.js';

async function canonical(path: string): Promise<string> {
  try {
    return await realpath(path);
  } catch {
    return path;
  }
}

/**
 * Checks run before any filesystem mutation:
 * - saveDir exists and is a directory
 * - the cloud root (parent of cloudTarget) exists
 * - saveDir and cloudTarget are distinct and not nested in one another
 */
export async function validateWorkflowPaths(saveDir: string, cloudTarget: string): Promise<void> {
  if (!(await pathExists(saveDir))) {
    throw ValidationError.fromMissingDirectory('Save folder', saveDir);
  }
  if (!(await isDirectory(saveDir))) {
    throw ValidationError.fromNotADirectory('Save folder', saveDir);
  }

  const cloudRoot = dirname(cloudTarget);
  if (!(await pathExists(cloudRoot))) {
    throw ValidationError.fromMissingDirectory('Cloud folder', cloudRoot);
  }
  if (!(await isDirectory(cloudRoot))) {
    throw ValidationError.fromNotADirectory('Cloud folder', cloudRoot);
  }
  if ((await pathExists(cloudTarget)) && !(await isDirectory(cloudTarget))) {
    throw ValidationError.fromNotADirectory('Cloud target', cloudTarget);
  }

  const realSave = await canonical(saveDir);
  const realTarget = await canonical(cloudTarget);
  if (isSameOrInside(realSave, realTarget) || isSameOrInside(realTarget, realSave)) {
    throw ValidationError.fromOverlap(saveDir, cloudTarget);
  }
}

/**
 * Backups land in <backupRoot>/Saves-backup-<timestamp>; a root inside the
 * save folder would copy the folder into itself
 */
export async function validateBackupRoot(saveDir: string, backupRoot: string): Promise<void> {
  const realSave = await canonical(saveDir);
  const realRoot = await canonical(backupRoot);
  if (isSameOrInside(realRoot, realSave)) {
    throw ValidationError.fromBackupRootInside(saveDir, backupRoot);
  }
}

/**
 * A link is removed without touching its target, so only a backup that
 * contains the link path conflicts. A real save folder is deleted in full,
 * so the backup must not be it, inside it or above it.
 */
export async function validateRestoreSource(
  saveDir: string,
  backupPath: string,
  saveIsLink: boolean
): Promise<void> {
  const realBackup = await canonical(backupPath);
  if (saveIsLink) {
    if (isSameOrInside(saveDir, realBackup)) {
      throw ValidationError.fromBackupOverlap(saveDir, backupPath);
    }
    return;
  }

  const realSave = await canonical(saveDir);
  if (isSameOrInside(realBackup, realSave) || isSameOrInside(realSave, realBackup)) {
    throw ValidationError.fromBackupOverlap(saveDir, backupPath);
  }
}
