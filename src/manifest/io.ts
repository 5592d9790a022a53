/**
 * Manifest IO operations: atomic writing, reading and scanning the backup root
 */

import { readdir, readFile, rename, writeFile } from 'fs/promises';
import { join } from 'path';
import { isDirectory } from '../fs/operations.js';
import { BackupManifest, isValidBackupManifest } from './types.js';

export const MANIFEST_SUFFIX = '.manifest.json';

/**
 * Manifest path for a backup directory: a sibling file, so restoring the
 * directory never copies the manifest along
 */
export function getManifestPath(backupPath: string): string {
  return `${backupPath}${MANIFEST_SUFFIX}`;
}

/**
 * Save manifest atomically: write to temp file, then rename
 */
export async function writeBackupManifest(manifest: BackupManifest): Promise<string> {
  const manifestPath = getManifestPath(manifest.backupPath);
  const tempPath = `${manifestPath}.tmp`;

  await writeFile(tempPath, JSON.stringify(manifest, null, 2), 'utf-8');
  await rename(tempPath, manifestPath);

  return manifestPath;
}

/**
 * Read and validate a manifest file
 * Throws if the file is missing or malformed
 */
export async function readBackupManifest(manifestPath: string): Promise<BackupManifest> {
  const content = await readFile(manifestPath, 'utf-8');
  const parsed: unknown = JSON.parse(content);

  if (!isValidBackupManifest(parsed)) {
    throw new Error(`Invalid manifest structure: ${manifestPath}`);
  }

  return parsed;
}

/**
 * All readable manifests under backupRoot, newest first.
 * Unreadable or invalid files are skipped; a missing root yields [].
 */
export async function listBackupManifests(
  backupRoot: string,
  onSkip?: (manifestPath: string, reason: string) => void
): Promise<BackupManifest[]> {
  let names: string[];
  try {
    names = await readdir(backupRoot);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const manifests: BackupManifest[] = [];
  for (const name of names.filter((n) => n.endsWith(MANIFEST_SUFFIX))) {
    const manifestPath = join(backupRoot, name);
    try {
      manifests.push(await readBackupManifest(manifestPath));
    } catch (error) {
      onSkip?.(manifestPath, error instanceof Error ? error.message : String(error));
    }
  }

  return manifests.sort(
    (a, b) =>
      Date.parse(b.createdAt) - Date.parse(a.createdAt) || b.backupPath.localeCompare(a.backupPath)
  );
}

/**
 * Most recent backup recorded for saveDir whose directory still exists
 */
export async function findLatestBackup(
  backupRoot: string,
  saveDir: string
): Promise<BackupManifest | null> {
  for (const manifest of await listBackupManifests(backupRoot)) {
    if (manifest.saveDir === saveDir && (await isDirectory(manifest.backupPath))) {
      return manifest;
    }
  }
  return null;
}
