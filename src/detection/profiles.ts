/**
 * Known game layouts: where saves live and where the game installs
 */

export interface GameProfile {
  /** Display name, also the executable / bundle base name */
  name: string;
  /** Folder under the platform's app-data directory holding the Saves folder */
  dataFolder: string;
  /** Name of the folder the game reads saves from */
  savesFolder: string;
  /** Install folder name inside Steam / GOG libraries */
  installDirName: string;
}

export const STARDEW_VALLEY: GameProfile = {
  name: 'Stardew Valley',
  dataFolder: 'StardewValley',
  savesFolder: 'Saves',
  installDirName: 'Stardew Valley',
};

export const GAME_PROFILES: Record<string, GameProfile> = {
  'stardew-valley': STARDEW_VALLEY,
};

export const DEFAULT_GAME_ID = 'stardew-valley';
