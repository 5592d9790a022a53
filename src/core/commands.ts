/**
 * Migrate, Link and Restore workflows
 *
 * Each command runs its steps strictly in order and converts every failure
 * into a failed OperationResult at its own boundary. Completed steps are
 * never rolled back: the Link ordering guarantees the save data exists in the
 * cloud copy and in a backup before the local folder is removed.
 */

import {
  backupFolder,
  copyContents,
  ensureDirectory,
  isDirectory,
  pathExists,
  removePath,
  restoreDirectory,
} from '../fs/operations.js';
import type { HostPlatform, LinkStrategy } from '../link/types.js';
import { SCHEMA_VERSION } from '../manifest/types.js';
import { writeBackupManifest } from '../manifest/io.js';
import {
  AlreadyLinkedError,
  NoBackupAvailableError,
  RemovalError,
  SaveLinkerError,
  nativeMessage,
} from '../utils/errors.js';
import type { LogSink } from '../utils/logger.js';
import { silentSink } from '../utils/logger.js';
import type { Command, OperationResult } from './types.js';
import { validateBackupRoot, validateRestoreSource, validateWorkflowPaths } from './validation.js';

/**
 * Convert anything thrown into a failed result labelled with the stage
 */
export function toFailedResult(error: unknown, stage: string): OperationResult {
  const message =
    error instanceof SaveLinkerError ? error.describe() : `[${stage}] ${nativeMessage(error)}`;
  const result: OperationResult = { success: false, message };
  if (error instanceof SaveLinkerError) {
    result.errorKind = error.kind;
  }
  return result;
}

/**
 * Base for the three workflows: stage tracking and failure conversion
 */
abstract class WorkflowCommand implements Command {
  protected stage = 'start';

  constructor(protected readonly sink: LogSink = silentSink) {}

  abstract execute(): Promise<OperationResult>;

  async canUndo(): Promise<boolean> {
    return false;
  }

  async undo(): Promise<OperationResult> {
    return {
      success: false,
      message: `${this.constructor.name} cannot be undone`,
    };
  }

  protected enter(stage: string, line: string): void {
    this.stage = stage;
    this.sink(line);
  }

  protected fail(error: unknown): OperationResult {
    const result = toFailedResult(error, this.stage);
    this.sink(`[ERROR] ${result.message}`);
    return result;
  }
}

export interface MigrateParams {
  saveDir: string;
  cloudTarget: string;
  sink?: LogSink;
}

/**
 * Copy the saves into the cloud folder; the save folder is left untouched
 */
export class MigrateCommand extends WorkflowCommand {
  private readonly saveDir: string;
  private readonly cloudTarget: string;

  constructor(params: MigrateParams) {
    super(params.sink);
    this.saveDir = params.saveDir;
    this.cloudTarget = params.cloudTarget;
  }

  async execute(): Promise<OperationResult> {
    try {
      this.enter('validate', '[MIGRATE] Starting migration to cloud...');
      await validateWorkflowPaths(this.saveDir, this.cloudTarget);

      this.enter('ensure-cloud', `[MIGRATE] Preparing cloud folder ${this.cloudTarget}`);
      await ensureDirectory(this.cloudTarget);

      this.enter('copy', '[MIGRATE] Copying saves to cloud folder...');
      const summary = await copyContents(this.saveDir, this.cloudTarget, {
        overwrite: true,
        sink: this.sink,
      });

      this.enter('done', `[OK] Migration complete! ${summary.copied.length} entries copied to cloud.`);
      return { success: true, message: 'Saves migrated to cloud successfully!' };
    } catch (error) {
      return this.fail(error);
    }
  }
}

export interface LinkParams {
  saveDir: string;
  cloudTarget: string;
  backupRoot: string;
  strategy: LinkStrategy;
  platform: HostPlatform;
  sink?: LogSink;
  now?: () => Date;
}

/**
 * Move the saves into the cloud folder and leave a link in their place.
 * Order: check link → validate → ensure cloud → copy → backup → remove → link
 */
export class LinkCommand extends WorkflowCommand {
  private readonly params: LinkParams;
  private backupPath: string | null = null;

  constructor(params: LinkParams) {
    super(params.sink);
    this.params = params;
  }

  getBackupPath(): string | null {
    return this.backupPath;
  }

  async execute(): Promise<OperationResult> {
    const { saveDir, cloudTarget, backupRoot, strategy } = this.params;
    const now = this.params.now ?? (() => new Date());

    try {
      this.enter('check-link', '[LINK] Starting link setup...');
      if (await strategy.isLink(saveDir)) {
        return this.fail(new AlreadyLinkedError(saveDir));
      }

      this.enter('validate', '[LINK] Validating folders...');
      await validateWorkflowPaths(saveDir, cloudTarget);
      await validateBackupRoot(saveDir, backupRoot);

      this.enter('ensure-cloud', `[LINK] Preparing cloud folder ${cloudTarget}`);
      await ensureDirectory(cloudTarget);

      this.enter('copy', '[LINK] Copying saves to cloud folder...');
      await copyContents(saveDir, cloudTarget, { overwrite: true, sink: this.sink });

      this.enter('backup', '[LINK] Creating backup...');
      const createdAt = now();
      this.backupPath = await backupFolder(saveDir, backupRoot, createdAt);
      this.sink(`[BACKUP] Created: ${this.backupPath}`);
      await this.recordManifest(this.backupPath, createdAt);

      this.enter('remove', '[LINK] Removing original saves folder...');
      await removePath(saveDir);

      this.enter('create-link', `[LINK] Creating ${strategy.kind}...`);
      await strategy.createLink(saveDir, cloudTarget);

      this.enter('done', '[OK] Link created successfully! Saves are now synced via cloud.');
      return {
        success: true,
        message: 'Link created successfully!',
        backupPath: this.backupPath,
      };
    } catch (error) {
      return this.fail(error);
    }
  }

  /**
   * The manifest only makes the backup discoverable after a restart;
   * failing to write it does not block the link.
   */
  private async recordManifest(backupPath: string, createdAt: Date): Promise<void> {
    try {
      const manifestPath = await writeBackupManifest({
        schemaVersion: SCHEMA_VERSION,
        backupPath,
        createdAt: createdAt.toISOString(),
        saveDir: this.params.saveDir,
        cloudTarget: this.params.cloudTarget,
        platform: this.params.platform,
      });
      this.sink(`[BACKUP] Manifest: ${manifestPath}`);
    } catch (error) {
      this.sink(`[BACKUP] Could not write manifest: ${nativeMessage(error)}`);
    }
  }

  async canUndo(): Promise<boolean> {
    return this.backupPath !== null && (await isDirectory(this.backupPath));
  }

  /**
   * Put the pre-link folder back from this command's backup
   */
  async undo(): Promise<OperationResult> {
    const restore = new RestoreCommand({
      saveDir: this.params.saveDir,
      backupPath: this.backupPath,
      strategy: this.params.strategy,
      sink: (line) => this.sink(line.replace('[RESTORE]', '[UNDO]')),
    });
    return restore.execute();
  }
}

export interface RestoreParams {
  saveDir: string;
  backupPath: string | null;
  strategy: LinkStrategy;
  sink?: LogSink;
}

/**
 * Replace whatever occupies the save folder with a real copy of a backup
 */
export class RestoreCommand extends WorkflowCommand {
  private readonly params: RestoreParams;

  constructor(params: RestoreParams) {
    super(params.sink);
    this.params = params;
  }

  async execute(): Promise<OperationResult> {
    const { saveDir, backupPath, strategy } = this.params;

    try {
      this.enter('validate-backup', '[RESTORE] Starting restore...');
      if (!backupPath) {
        return this.fail(NoBackupAvailableError.fromMissingHandle());
      }
      if (!(await isDirectory(backupPath))) {
        return this.fail(NoBackupAvailableError.fromMissingDirectory(backupPath));
      }
      const saveIsLink = await strategy.isLink(saveDir);
      await validateRestoreSource(saveDir, backupPath, saveIsLink);

      this.enter('remove', '[RESTORE] Removing link/junction...');
      await this.removeCurrent(saveDir, saveIsLink, strategy);

      this.enter('copy', `[RESTORE] Restoring from ${backupPath}...`);
      await restoreDirectory(backupPath, saveDir);

      this.enter('done', '[OK] Restore complete!');
      return { success: true, message: 'Backup restored successfully!', backupPath };
    } catch (error) {
      return this.fail(error);
    }
  }

  private async removeCurrent(
    saveDir: string,
    saveIsLink: boolean,
    strategy: LinkStrategy
  ): Promise<void> {
    try {
      if (saveIsLink) {
        await strategy.removeLink(saveDir);
      } else {
        await removePath(saveDir);
      }
    } catch (error) {
      throw error instanceof SaveLinkerError ? error : RemovalError.fromNative(saveDir, error);
    }

    if (await pathExists(saveDir)) {
      throw new RemovalError(`Save folder still present after removal: ${saveDir}`);
    }
  }
}
