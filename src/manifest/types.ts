/**
 * Backup manifest schema and versioning
 * One manifest sits next to each backup directory:
 * <backupRoot>/Saves-backup-<timestamp>.manifest.json
 */

import type { HostPlatform } from '../link/types.js';

/**
 * Schema version constant - increment when manifest structure changes
 */
export const SCHEMA_VERSION = '1.0.0';

export interface BackupManifest {
  schemaVersion: string;
  /** Absolute path of the backup directory */
  backupPath: string;
  /** Backup creation timestamp (ISO 8601) */
  createdAt: string;
  /** Save folder the backup was taken from */
  saveDir: string;
  /** Cloud folder the save folder was linked to */
  cloudTarget: string;
  platform: HostPlatform;
}

const PLATFORMS: readonly string[] = ['darwin', 'win32', 'linux'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Runtime type guard for manifests read from disk
 */
export function isValidBackupManifest(value: unknown): value is BackupManifest {
  if (!isRecord(value)) {
    return false;
  }
  return (
    typeof value.schemaVersion === 'string' &&
    typeof value.backupPath === 'string' &&
    typeof value.createdAt === 'string' &&
    !Number.isNaN(Date.parse(value.createdAt)) &&
    typeof value.saveDir === 'string' &&
    typeof value.cloudTarget === 'string' &&
    typeof value.platform === 'string' &&
    PLATFORMS.includes(value.platform)
  );
}
