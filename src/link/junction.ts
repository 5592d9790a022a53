import { execFile } from 'child_process';
import { lstat, rmdir } from 'fs/promises';
import type { LinkStrategy, ProcessResult, ProcessRunner } from './types.js';
import { LinkCreationError } from '../utils/errors.js';

/**
 * Default runner: execFile, resolving with the exit code instead of rejecting
 */
export const runProcess: ProcessRunner = (file, args) =>
  new Promise<ProcessResult>((resolve) => {
    execFile(file, args, { windowsHide: true }, (error, stdout, stderr) => {
      let exitCode = 0;
      if (error) {
        exitCode = typeof error.code === 'number' ? error.code : 1;
        if (!stderr && typeof error.code !== 'number') {
          // spawn failure (e.g. ENOENT): surface it as stderr
          stderr = error.message;
        }
      }
      resolve({ exitCode, stdout: String(stdout), stderr: String(stderr) });
    });
  });

async function pathPresent(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * NTFS directory junctions (Windows).
 * Junctions look like plain directories to stat(), so detection asks
 * fsutil for reparse-point metadata instead.
 */
export class JunctionStrategy implements LinkStrategy {
  readonly kind = 'junction';

  constructor(private readonly run: ProcessRunner = runProcess) {}

  async createLink(linkPath: string, targetPath: string): Promise<void> {
    const result = await this.run('cmd', ['/c', 'mklink', '/J', linkPath, targetPath]);
    if (result.exitCode !== 0) {
      const native = result.stderr.trim() || result.stdout.trim() || 'mklink failed';
      throw LinkCreationError.fromNative('junction', linkPath, native);
    }
  }

  async isLink(path: string): Promise<boolean> {
    if (!(await pathPresent(path))) {
      return false;
    }
    const result = await this.run('cmd', ['/c', 'fsutil', 'reparsepoint', 'query', path]);
    return result.exitCode === 0;
  }

  async removeLink(path: string): Promise<void> {
    if (!(await this.isLink(path))) {
      return;
    }
    // rmdir on a junction drops the reparse point, never the target's contents
    await rmdir(path);
  }
}
