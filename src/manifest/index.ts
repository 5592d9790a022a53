/**
 * Backup manifest schema and read/write operations
 */

export { SCHEMA_VERSION, type BackupManifest, isValidBackupManifest } from './types.js';

export {
  MANIFEST_SUFFIX,
  getManifestPath,
  writeBackupManifest,
  readBackupManifest,
  listBackupManifests,
  findLatestBackup,
} from './io.js';
