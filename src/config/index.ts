/**
 * Application configuration
 * Built once at process start and passed explicitly to the orchestrator
 */

import { homedir } from 'os';
import { join, resolve } from 'path';
import { DEFAULT_GAME_ID, GAME_PROFILES } from '../detection/profiles.js';
import type { GameProfile } from '../detection/profiles.js';
import { expandHome } from '../fs/operations.js';
import { ValidationError } from '../utils/errors.js';

export const DEFAULT_APP_NAME = 'StardewValleyCrossSaves';
export const BACKUP_ROOT_ENV = 'SAVE_LINKER_BACKUP_ROOT';
/** Folder created inside the cloud root to hold the saves */
export const CLOUD_SAVES_FOLDER = 'Saves';

export interface AppConfig {
  readonly appName: string;
  /** "<appName>_Backups" */
  readonly backupFolderName: string;
  /** Absolute directory that receives every Saves-backup-<timestamp> folder */
  readonly backupRoot: string;
  readonly gameProfile: GameProfile;
}

export interface ConfigOverrides {
  appName?: string;
  backupRoot?: string;
  gameId?: string;
  home?: string;
}

/**
 * Resolve configuration from explicit overrides, then the environment, then defaults
 */
export function createConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const home = overrides.home ?? homedir();
  const appName = overrides.appName?.trim() || DEFAULT_APP_NAME;
  const backupFolderName = `${appName}_Backups`;

  const explicitRoot = overrides.backupRoot ?? env[BACKUP_ROOT_ENV];
  const backupRoot = explicitRoot
    ? resolve(expandHome(explicitRoot, home))
    : join(home, backupFolderName);

  const gameId = overrides.gameId ?? DEFAULT_GAME_ID;
  const gameProfile = GAME_PROFILES[gameId];
  if (!gameProfile) {
    throw new ValidationError(
      `Unknown game: ${gameId}`,
      `Known games: ${Object.keys(GAME_PROFILES).join(', ')}`
    );
  }

  return { appName, backupFolderName, backupRoot, gameProfile };
}

/**
 * CloudTarget is always <cloudRoot>/Saves
 */
export function resolveCloudTarget(cloudRoot: string): string {
  return join(cloudRoot, CLOUD_SAVES_FOLDER);
}
