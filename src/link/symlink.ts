import { lstat, symlink, unlink } from 'fs/promises';
import type { LinkStrategy } from './types.js';
import { LinkCreationError, nativeMessage } from '../utils/errors.js';

function isMissing(error: unknown): boolean {
  return (error as NodeJS.ErrnoException).code === 'ENOENT';
}

/**
 * POSIX directory symlinks (macOS, Linux)
 */
export class SymlinkStrategy implements LinkStrategy {
  readonly kind = 'symlink';

  async createLink(linkPath: string, targetPath: string): Promise<void> {
    try {
      await symlink(targetPath, linkPath, 'dir');
    } catch (error) {
      throw LinkCreationError.fromNative('symlink', linkPath, nativeMessage(error));
    }
  }

  async isLink(path: string): Promise<boolean> {
    try {
      const stats = await lstat(path);
      return stats.isSymbolicLink();
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }
      throw error;
    }
  }

  async removeLink(path: string): Promise<void> {
    if (!(await this.isLink(path))) {
      return;
    }
    await unlink(path);
  }
}
