import { Command } from 'commander';
import type { CliHandlers, GlobalOptions } from './types.js';

export const PROGRAM_NAME = 'save-linker';
export const PROGRAM_VERSION = '0.1.0';

/**
 * Build the commander program; every action resolves to an exit code
 * reported through onExit
 */
export function createProgram(handlers: CliHandlers, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description("Move a game's save folder into a cloud-synced folder and link it back in place")
    .version(PROGRAM_VERSION)
    .option('--backup-root <dir>', 'Directory receiving Saves-backup-<timestamp> folders (default: ~/<app-name>_Backups)')
    .option('--app-name <name>', 'Application name used for the default backup folder')
    .option('--game <id>', 'Game profile used by detect (default: stardew-valley)')
    .option('--verbose', 'Enable verbose logging');

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  program
    .command('migrate')
    .description('Copy the save folder into <cloudRoot>/Saves; the save folder is left as is')
    .argument('<saveDir>', 'Save folder the game reads from')
    .argument('<cloudRoot>', 'Cloud-synced folder')
    .action(async (saveDir: string, cloudRoot: string) => {
      onExit(await handlers.workflow({ workflow: 'migrate', saveDir, cloudRoot }, globals()));
    });

  program
    .command('link')
    .description('Copy the saves to <cloudRoot>/Saves, back them up, and replace the save folder with a link')
    .argument('<saveDir>', 'Save folder the game reads from')
    .argument('<cloudRoot>', 'Cloud-synced folder')
    .action(async (saveDir: string, cloudRoot: string) => {
      onExit(await handlers.workflow({ workflow: 'link', saveDir, cloudRoot }, globals()));
    });

  program
    .command('restore')
    .description('Replace the link with a real folder copied from a backup (default: latest recorded backup)')
    .argument('<saveDir>', 'Save folder the game reads from')
    .argument('[backupPath]', 'Backup directory to restore from')
    .action(async (saveDir: string, backupPath: string | undefined) => {
      onExit(await handlers.workflow({ workflow: 'restore', saveDir, backupPath }, globals()));
    });

  program
    .command('backups')
    .description('List recorded backups, newest first')
    .action(async () => {
      onExit(await handlers.backups(globals()));
    });

  program
    .command('detect')
    .description('Look for the game save folder and installation on this machine')
    .action(async () => {
      onExit(await handlers.detect(globals()));
    });

  return program;
}
