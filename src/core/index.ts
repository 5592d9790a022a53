import type { AppConfig } from '../config/index.js';
import { normalizePath } from '../fs/index.js';
import { detectPlatform } from '../link/index.js';
import type { HostPlatform, LinkStrategy } from '../link/index.js';
import { findLatestBackup, listBackupManifests } from '../manifest/index.js';
import type { BackupManifest } from '../manifest/index.js';
import type { LogSink } from '../utils/logger.js';
import { silentSink } from '../utils/logger.js';
import { ValidationError, nativeMessage } from '../utils/errors.js';
import { LinkCommand, MigrateCommand, RestoreCommand, toFailedResult } from './commands.js';
import type { OperationResult } from './types.js';

export { LinkCommand, MigrateCommand, RestoreCommand, toFailedResult } from './commands.js';
export type { LinkParams, MigrateParams, RestoreParams } from './commands.js';
export type { Command, OperationResult } from './types.js';
export { validateBackupRoot, validateRestoreSource, validateWorkflowPaths } from './validation.js';
export {
  JunctionStrategy,
  SymlinkStrategy,
  createLinkStrategy,
  detectPlatform,
  getPlatformName,
} from '../link/index.js';
export type { HostPlatform, LinkKind, LinkStrategy } from '../link/index.js';
export { copyContents, backupFolder, removePath, restoreDirectory } from '../fs/index.js';
export type { BackupManifest } from '../manifest/index.js';

export interface SaveLinkerOptions {
  sink?: LogSink;
  platform?: HostPlatform;
  now?: () => Date;
}

/**
 * Entry point for front ends: normalizes the paths it is given, runs one
 * workflow, and remembers the most recent backup for the session.
 *
 * Calls against the same save folder must be serialized by the caller;
 * nothing here locks, cancels or times out a running workflow.
 */
export class SaveLinker {
  private lastBackup: { saveDir: string; backupPath: string } | null = null;
  private readonly sink: LogSink;
  private readonly platform: HostPlatform;
  private readonly now?: () => Date;

  constructor(
    private readonly config: AppConfig,
    private readonly strategy: LinkStrategy,
    options: SaveLinkerOptions = {}
  ) {
    this.sink = options.sink ?? silentSink;
    this.platform = options.platform ?? detectPlatform();
    this.now = options.now;
  }

  /**
   * Backup taken by the last successful link in this session
   */
  get latestBackup(): string | null {
    return this.lastBackup?.backupPath ?? null;
  }

  async migrate(saveDir: string, cloudTarget: string): Promise<OperationResult> {
    return this.guard(async () => {
      const command = new MigrateCommand({
        saveDir: await this.requirePath('Save folder', saveDir),
        cloudTarget: await this.requirePath('Cloud target', cloudTarget),
        sink: this.sink,
      });
      return command.execute();
    });
  }

  async link(saveDir: string, cloudTarget: string): Promise<OperationResult> {
    return this.guard(async () => {
      const source = await this.requirePath('Save folder', saveDir);
      const command = new LinkCommand({
        saveDir: source,
        cloudTarget: await this.requirePath('Cloud target', cloudTarget),
        backupRoot: await this.requirePath('Backup root', this.config.backupRoot),
        strategy: this.strategy,
        platform: this.platform,
        sink: this.sink,
        now: this.now,
      });

      const result = await command.execute();
      if (result.success && result.backupPath) {
        this.lastBackup = { saveDir: source, backupPath: result.backupPath };
      }
      return result;
    });
  }

  /**
   * Restore from an explicit backup, else the session's latest for this
   * save folder, else the newest manifest recorded for it.
   */
  async restore(saveDir: string, backupPath?: string): Promise<OperationResult> {
    return this.guard(async () => {
      const target = await this.requirePath('Save folder', saveDir);
      let backup: string | null;
      if (backupPath) {
        backup = await normalizePath(backupPath);
      } else if (this.lastBackup?.saveDir === target) {
        backup = this.lastBackup.backupPath;
      } else {
        backup = await this.recordedBackup(target);
      }

      const command = new RestoreCommand({
        saveDir: target,
        backupPath: backup,
        strategy: this.strategy,
        sink: this.sink,
      });
      return command.execute();
    });
  }

  /**
   * Every backup manifest under the backup root, newest first
   */
  async listBackups(): Promise<BackupManifest[]> {
    return listBackupManifests(await normalizePath(this.config.backupRoot), (path, reason) =>
      this.sink(`[SKIP] Ignoring manifest ${path}: ${reason}`)
    );
  }

  private async requirePath(label: string, value: string): Promise<string> {
    if (!value.trim()) {
      throw new ValidationError(`${label} path is empty`);
    }
    return normalizePath(value);
  }

  /**
   * Nothing is thrown past the orchestrator
   */
  private async guard(run: () => Promise<OperationResult>): Promise<OperationResult> {
    try {
      return await run();
    } catch (error) {
      const result = toFailedResult(error, 'start');
      this.sink(`[ERROR] ${result.message}`);
      return result;
    }
  }

  private async recordedBackup(saveDir: string): Promise<string | null> {
    let manifest: BackupManifest | null;
    try {
      manifest = await findLatestBackup(await normalizePath(this.config.backupRoot), saveDir);
    } catch (error) {
      this.sink(`[RESTORE] Could not scan backup root: ${nativeMessage(error)}`);
      return null;
    }
    if (!manifest) {
      return null;
    }
    this.sink(`[RESTORE] Using recorded backup from ${manifest.createdAt}`);
    return manifest.backupPath;
  }
}
