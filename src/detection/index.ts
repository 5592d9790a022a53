/**
 * Save folder and game installation detection
 */

export { STARDEW_VALLEY, GAME_PROFILES, DEFAULT_GAME_ID } from './profiles.js';
export type { GameProfile } from './profiles.js';
export { currentEnv, getSaveCandidates, getInstallCandidates, getPlatformHint } from './paths.js';
export type { DetectionEnv } from './paths.js';
export { findSavesPath, findInstallation } from './game.js';
