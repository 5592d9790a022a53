/**
 * Filesystem facade
 */

export {
  BACKUP_DIR_PREFIX,
  expandHome,
  normalizePath,
  pathExists,
  isDirectory,
  ensureDirectory,
  isSameOrInside,
  copyContents,
  formatBackupTimestamp,
  backupFolder,
  removePath,
  restoreDirectory,
} from './operations.js';
export type { CopyOptions, CopySummary } from './operations.js';
