/**
 * Tests for save folder and installation detection against a fake home directory
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdir, mkdtemp, realpath, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { findInstallation, findSavesPath } from './game.js';
import { STARDEW_VALLEY } from './profiles.js';

describe('game detection', () => {
  let home: string;

  beforeEach(async () => {
    home = await realpath(await mkdtemp(join(tmpdir(), 'save-linker-home-')));
  });

  afterEach(async () => {
    try {
      await rm(home, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  describe('findSavesPath', () => {
    it('should return the existing save folder', async () => {
      const saves = join(home, '.config', 'StardewValley', 'Saves');
      await mkdir(saves, { recursive: true });

      expect(await findSavesPath(STARDEW_VALLEY, 'linux', { home })).toBe(saves);
    });

    it('should prefer the first macOS candidate that exists', async () => {
      const appSupport = join(home, 'Library', 'Application Support', 'StardewValley', 'Saves');
      await mkdir(appSupport, { recursive: true });
      await mkdir(join(home, '.config', 'StardewValley', 'Saves'), { recursive: true });

      expect(await findSavesPath(STARDEW_VALLEY, 'darwin', { home })).toBe(appSupport);
    });

    it('should ignore a file where the folder should be', async () => {
      await mkdir(join(home, '.config', 'StardewValley'), { recursive: true });
      await writeFile(join(home, '.config', 'StardewValley', 'Saves'), 'not a folder');

      expect(await findSavesPath(STARDEW_VALLEY, 'linux', { home })).toBeNull();
    });

    it('should return null when nothing exists', async () => {
      expect(await findSavesPath(STARDEW_VALLEY, 'linux', { home })).toBeNull();
    });
  });

  describe('findInstallation', () => {
    it('should accept a Steam library folder holding the Linux binary', async () => {
      const install = join(home, '.local', 'share', 'Steam', 'steamapps', 'common', 'Stardew Valley');
      await mkdir(install, { recursive: true });
      await writeFile(join(install, 'Stardew Valley'), '');

      expect(await findInstallation(STARDEW_VALLEY, 'linux', { home })).toBe(install);
    });

    it('should skip a library folder without the binary', async () => {
      await mkdir(join(home, '.steam', 'steam', 'steamapps', 'common', 'Stardew Valley'), {
        recursive: true,
      });

      expect(await findInstallation(STARDEW_VALLEY, 'linux', { home })).toBeNull();
    });

    it('should accept a macOS app bundle in the user Applications folder', async () => {
      const bundle = join(home, 'Applications', 'Stardew Valley.app');
      await mkdir(bundle, { recursive: true });

      expect(await findInstallation(STARDEW_VALLEY, 'darwin', { home })).toBe(bundle);
    });

    it('should accept a macOS Steam folder with a Contents directory', async () => {
      const steam = join(home, 'Library', 'Application Support', 'Steam', 'steamapps', 'common', 'Stardew Valley');
      await mkdir(join(steam, 'Contents'), { recursive: true });

      expect(await findInstallation(STARDEW_VALLEY, 'darwin', { home })).toBe(steam);
    });
  });
});
