/**
 * Handler tests against real temp directories on the symlink strategy
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { lstat, mkdir, mkdtemp, realpath, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { createHandlers } from './handlers.js';
import type { CliHandlers } from './types.js';
import { resetLogger } from '../utils/logger.js';

describe('createHandlers', () => {
  let root: string;
  let saveDir: string;
  let cloudRoot: string;
  let backupRoot: string;
  let lines: string[];
  let printed: string[];
  let handlers: CliHandlers;

  beforeEach(async () => {
    resetLogger();
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});

    root = await realpath(await mkdtemp(join(tmpdir(), 'save-linker-cli-')));
    saveDir = join(root, 'game', 'Saves');
    cloudRoot = join(root, 'cloud');
    backupRoot = join(root, 'backups');
    lines = [];
    printed = [];
    await mkdir(saveDir, { recursive: true });
    await mkdir(cloudRoot);
    await writeFile(join(saveDir, 'A.txt'), 'farm-a');

    handlers = createHandlers({
      platform: 'linux',
      env: {},
      detectionEnv: { home: root },
      sink: (line) => lines.push(line),
      print: (line) => printed.push(line),
    });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    try {
      await rm(root, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  it('should exit 0 after a link and 2 when linking again', async () => {
    const first = await handlers.workflow({ workflow: 'link', saveDir, cloudRoot }, { backupRoot });
    const second = await handlers.workflow({ workflow: 'link', saveDir, cloudRoot }, { backupRoot });

    expect(first).toBe(0);
    expect((await lstat(saveDir)).isSymbolicLink()).toBe(true);
    expect(second).toBe(2);
    expect(lines[lines.length - 1]).toBe(
      `[ERROR] [check-link] The save folder is already a link/junction: ${saveDir}. Use restore first.`
    );
  });

  it('should restore from the recorded backup in a later run', async () => {
    await handlers.workflow({ workflow: 'link', saveDir, cloudRoot }, { backupRoot });
    const later = createHandlers({ platform: 'linux', env: {}, sink: () => {} });

    const code = await later.workflow({ workflow: 'restore', saveDir }, { backupRoot });

    expect(code).toBe(0);
    expect((await lstat(saveDir)).isSymbolicLink()).toBe(false);
  });

  it('should exit 7 when no backup is recorded', async () => {
    const code = await handlers.workflow({ workflow: 'restore', saveDir }, { backupRoot });

    expect(code).toBe(7);
  });

  it('should exit 1 for an unknown game', async () => {
    const code = await handlers.detect({ game: 'pong' });

    expect(code).toBe(1);
    expect(console.error).toHaveBeenCalledWith('[save-linker] ERROR: [validate] Unknown game: pong');
  });

  it('should report an empty backup root', async () => {
    const code = await handlers.backups({ backupRoot });

    expect(code).toBe(0);
    expect(printed).toEqual([`No backups recorded under ${backupRoot}`]);
  });

  it('should list the backup taken by a link', async () => {
    await handlers.workflow({ workflow: 'link', saveDir, cloudRoot }, { backupRoot });

    await handlers.backups({ backupRoot });

    expect(printed).toHaveLength(1);
    expect(printed[0]).toContain(`  ${backupRoot}/Saves-backup-`);
    expect(printed[0].endsWith(`(from ${saveDir})`)).toBe(true);
  });

  it('should print detection results', async () => {
    const saves = join(root, '.config', 'StardewValley', 'Saves');
    const install = join(root, '.steam', 'steam', 'steamapps', 'common', 'Stardew Valley');
    await mkdir(saves, { recursive: true });
    await mkdir(install, { recursive: true });
    await writeFile(join(install, 'Stardew Valley'), '');

    const code = await handlers.detect({});

    expect(code).toBe(0);
    expect(printed).toEqual([
      'Platform: Linux',
      `Saves: ${saves}`,
      `Stardew Valley: ${install}`,
      'Linux: typical Saves = ~/.config/StardewValley/Saves',
    ]);
  });

  it('should report missing detection results', async () => {
    await handlers.detect({});

    expect(printed).toEqual([
      'Platform: Linux',
      'Saves: not found',
      'Stardew Valley: installation not found',
      'Linux: typical Saves = ~/.config/StardewValley/Saves',
    ]);
  });
});
