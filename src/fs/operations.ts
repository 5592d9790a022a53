/**
 * Filesystem primitives shared by every workflow:
 * path normalization, merge copy, timestamped backup and safe removal
 */

import { cp, lstat, mkdir, readdir, realpath, rm, stat, unlink } from 'fs/promises';
import type { Stats } from 'fs';
import { homedir } from 'os';
import { basename, dirname, join, resolve, sep } from 'path';
import type { LogSink } from '../utils/logger.js';
import { silentSink } from '../utils/logger.js';
import { BackupError, CopyError, RemovalError } from '../utils/errors.js';

export const BACKUP_DIR_PREFIX = 'Saves-backup-';

export interface CopyOptions {
  /** Replace same-named destination entries (default: true) */
  overwrite?: boolean;
  sink?: LogSink;
}

export interface CopySummary {
  copied: string[];
  skipped: string[];
}

/**
 * Expand a leading "~" to the user's home directory
 */
export function expandHome(input: string, home: string = homedir()): string {
  if (input === '~') {
    return home;
  }
  if (input.startsWith('~/') || input.startsWith('~\\')) {
    return join(home, input.slice(2));
  }
  return input;
}

/**
 * Absolute, canonical form of a user-supplied path.
 * Intermediate segments are resolved through realpath of the deepest
 * existing ancestor; the last segment is kept so a link there is not followed.
 */
export async function normalizePath(input: string): Promise<string> {
  const absolute = resolve(expandHome(input.trim()));
  const parent = dirname(absolute);
  if (parent === absolute) {
    return absolute;
  }
  return join(await canonicalAncestor(parent), basename(absolute));
}

async function canonicalAncestor(path: string): Promise<string> {
  try {
    return await realpath(path);
  } catch {
    const parent = dirname(path);
    if (parent === path) {
      return path;
    }
    return join(await canonicalAncestor(parent), basename(path));
  }
}

/**
 * True when the path exists; a dangling link counts as existing
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * True when the path (following links) is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Idempotent mkdir -p
 */
export async function ensureDirectory(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

/**
 * True when `child` equals `parent` or lives below it
 */
export function isSameOrInside(child: string, parent: string): boolean {
  if (child === parent) {
    return true;
  }
  const prefix = parent.endsWith(sep) ? parent : parent + sep;
  return child.startsWith(prefix);
}

async function deepCopy(src: string, dst: string): Promise<void> {
  await cp(src, dst, {
    recursive: true,
    preserveTimestamps: true,
    verbatimSymlinks: true,
    errorOnExist: true,
    force: false,
  });
}

/**
 * Merge every direct child of src into dst, creating dst if needed.
 * With overwrite, a same-named destination entry is deleted before the copy;
 * without it, the entry is skipped and reported as [SKIP].
 */
export async function copyContents(
  src: string,
  dst: string,
  options: CopyOptions = {}
): Promise<CopySummary> {
  const overwrite = options.overwrite ?? true;
  const sink = options.sink ?? silentSink;
  const summary: CopySummary = { copied: [], skipped: [] };

  try {
    await ensureDirectory(dst);
    const entries = await readdir(src);
    entries.sort();

    for (const name of entries) {
      const from = join(src, name);
      const to = join(dst, name);

      if (await pathExists(to)) {
        if (!overwrite) {
          sink(`[SKIP] ${to} already exists`);
          summary.skipped.push(name);
          continue;
        }
        await rm(to, { recursive: true, force: true });
      }

      await deepCopy(from, to);
      summary.copied.push(name);
    }
  } catch (error) {
    throw CopyError.fromNative(src, dst, error);
  }

  return summary;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * YYYYMMDD-HHMMSS in local time
 */
export function formatBackupTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}-${time}`;
}

async function nextFreeBackupPath(backupRoot: string, timestamp: string): Promise<string> {
  const base = join(backupRoot, `${BACKUP_DIR_PREFIX}${timestamp}`);
  if (!(await pathExists(base))) {
    return base;
  }
  let counter = 2;
  while (await pathExists(`${base}-${counter}`)) {
    counter++;
  }
  return `${base}-${counter}`;
}

/**
 * Deep-copy src into a new timestamped directory under backupRoot.
 * src is never modified. Returns the backup directory path.
 */
export async function backupFolder(
  src: string,
  backupRoot: string,
  now: Date = new Date()
): Promise<string> {
  try {
    await ensureDirectory(backupRoot);
    const backupPath = await nextFreeBackupPath(backupRoot, formatBackupTimestamp(now));
    await mkdir(backupPath);
    await copyInto(src, backupPath);
    return backupPath;
  } catch (error) {
    throw BackupError.fromNative(src, backupRoot, error);
  }
}

/**
 * Deep-copy the children of src into the existing directory dst
 */
async function copyInto(src: string, dst: string): Promise<void> {
  for (const name of await readdir(src)) {
    await deepCopy(join(src, name), join(dst, name));
  }
}

/**
 * Delete a path: links lose only their own entry, directories are removed
 * recursively, files are unlinked. Missing paths are a no-op.
 */
export async function removePath(path: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await lstat(path);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return;
    }
    throw RemovalError.fromNative(path, error);
  }

  try {
    if (stats.isSymbolicLink()) {
      await unlink(path);
    } else if (stats.isDirectory()) {
      await rm(path, { recursive: true, force: true });
    } else {
      await unlink(path);
    }
  } catch (error) {
    throw RemovalError.fromNative(path, error);
  }
}

/**
 * Deep-copy a backup back into place as a real directory
 */
export async function restoreDirectory(backupPath: string, target: string): Promise<void> {
  try {
    await ensureDirectory(dirname(target));
    await mkdir(target);
    await copyInto(backupPath, target);
  } catch (error) {
    throw CopyError.fromNative(backupPath, target, error);
  }
}
