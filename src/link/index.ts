/**
 * Directory link strategies (symlink on POSIX, junction on Windows)
 */

export type { HostPlatform, LinkKind, LinkStrategy, ProcessResult, ProcessRunner } from './types.js';
export { SymlinkStrategy } from './symlink.js';
export { JunctionStrategy, runProcess } from './junction.js';
export { createLinkStrategy, detectPlatform, getPlatformName } from './platform.js';
