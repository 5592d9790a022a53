import type { HostPlatform, LinkStrategy } from './types.js';
import { SymlinkStrategy } from './symlink.js';
import { JunctionStrategy } from './junction.js';

/**
 * Map a Node platform id to the host platforms this tool distinguishes
 */
export function detectPlatform(nodePlatform: NodeJS.Platform = process.platform): HostPlatform {
  if (nodePlatform === 'win32') return 'win32';
  if (nodePlatform === 'darwin') return 'darwin';
  return 'linux';
}

export function getPlatformName(platform: HostPlatform): string {
  switch (platform) {
    case 'darwin':
      return 'macOS';
    case 'win32':
      return 'Windows';
    case 'linux':
      return 'Linux';
  }
}

/**
 * Pick the link strategy once, at process start.
 * Windows gets junctions (no elevation needed), everything else symlinks.
 */
export function createLinkStrategy(platform: HostPlatform = detectPlatform()): LinkStrategy {
  return platform === 'win32' ? new JunctionStrategy() : new SymlinkStrategy();
}
