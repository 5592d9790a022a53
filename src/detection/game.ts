import { posix, win32 } from 'path';
import type { HostPlatform } from '../link/types.js';
import { isDirectory, pathExists } from '../fs/operations.js';
import type { GameProfile } from './profiles.js';
import type { DetectionEnv } from './paths.js';
import { getInstallCandidates, getSaveCandidates } from './paths.js';

/**
 * First save candidate that is an existing directory, or null
 */
export async function findSavesPath(
  profile: GameProfile,
  platform: HostPlatform,
  env: DetectionEnv
): Promise<string | null> {
  for (const candidate of getSaveCandidates(profile, platform, env)) {
    if (await isDirectory(candidate)) {
      return candidate;
    }
  }
  return null;
}

async function looksInstalled(
  candidate: string,
  profile: GameProfile,
  platform: HostPlatform
): Promise<boolean> {
  switch (platform) {
    case 'darwin':
      return (
        candidate.endsWith('.app') ||
        (await pathExists(posix.join(candidate, 'Contents'))) ||
        (await pathExists(posix.join(candidate, `${profile.name}.app`)))
      );
    case 'win32':
      return pathExists(win32.join(candidate, `${profile.name}.exe`));
    case 'linux':
      return pathExists(posix.join(candidate, profile.name));
  }
}

/**
 * First install candidate that exists and carries the platform's game binary
 */
export async function findInstallation(
  profile: GameProfile,
  platform: HostPlatform,
  env: DetectionEnv
): Promise<string | null> {
  for (const candidate of getInstallCandidates(profile, platform, env)) {
    if (!(await pathExists(candidate))) {
      continue;
    }
    if (await looksInstalled(candidate, profile, platform)) {
      return candidate;
    }
  }
  return null;
}
