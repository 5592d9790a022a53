/**
 * Platform-specific candidate locations for a game's saves and install
 */

import { homedir } from 'os';
import { posix, win32 } from 'path';
import type { HostPlatform } from '../link/types.js';
import type { GameProfile } from './profiles.js';

export interface DetectionEnv {
  home: string;
  /** %APPDATA% on Windows */
  appData?: string;
}

export function currentEnv(): DetectionEnv {
  return { home: homedir(), appData: process.env.APPDATA };
}

function joinFor(platform: HostPlatform): (...parts: string[]) => string {
  return platform === 'win32' ? win32.join : posix.join;
}

export function getSaveCandidates(
  profile: GameProfile,
  platform: HostPlatform,
  env: DetectionEnv
): string[] {
  const join = joinFor(platform);
  switch (platform) {
    case 'darwin':
      return [
        join(env.home, 'Library', 'Application Support', profile.dataFolder, profile.savesFolder),
        join(env.home, '.config', profile.dataFolder, profile.savesFolder),
      ];
    case 'win32':
      return env.appData ? [join(env.appData, profile.dataFolder, profile.savesFolder)] : [];
    case 'linux':
      return [join(env.home, '.config', profile.dataFolder, profile.savesFolder)];
  }
}

export function getInstallCandidates(
  profile: GameProfile,
  platform: HostPlatform,
  env: DetectionEnv
): string[] {
  const join = joinFor(platform);
  const dir = profile.installDirName;
  switch (platform) {
    case 'darwin':
      return [
        `/Applications/${profile.name}.app`,
        join(env.home, 'Applications', `${profile.name}.app`),
        join(env.home, 'Library', 'Application Support', 'Steam', 'steamapps', 'common', dir),
        `/Applications/${profile.name} GOG.app`,
      ];
    case 'win32':
      return [
        join('C:\\Program Files (x86)', 'Steam', 'steamapps', 'common', dir),
        join('C:\\Program Files', 'Steam', 'steamapps', 'common', dir),
        join('C:\\GOG Games', dir),
        join('C:\\Program Files (x86)', 'GOG Galaxy', 'Games', dir),
        join(env.home, 'AppData', 'Local', 'Steam', 'steamapps', 'common', dir),
      ];
    case 'linux':
      return [
        join(env.home, '.steam', 'steam', 'steamapps', 'common', dir),
        join(env.home, '.local', 'share', 'Steam', 'steamapps', 'common', dir),
        join(env.home, '.var', 'app', 'com.valvesoftware.Steam', '.local', 'share', 'Steam', 'steamapps', 'common', dir),
      ];
  }
}

export function getPlatformHint(profile: GameProfile, platform: HostPlatform): string {
  const saves = `${profile.dataFolder}/${profile.savesFolder}`;
  switch (platform) {
    case 'darwin':
      return `macOS: typical Saves = ~/Library/Application Support/${saves} or ~/.config/${saves}`;
    case 'win32':
      return `Windows: typical Saves = %AppData%\\${profile.dataFolder}\\${profile.savesFolder}`;
    case 'linux':
      return `Linux: typical Saves = ~/.config/${saves}`;
  }
}
