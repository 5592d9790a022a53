import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { createProgram } from './program.js';
import type { CliHandlers } from './types.js';

describe('createProgram', () => {
  let handlers: {
    workflow: jest.Mock<CliHandlers['workflow']>;
    backups: jest.Mock<CliHandlers['backups']>;
    detect: jest.Mock<CliHandlers['detect']>;
  };
  let onExit: jest.Mock<(code: number) => void>;

  beforeEach(() => {
    handlers = {
      workflow: jest.fn<CliHandlers['workflow']>().mockResolvedValue(0),
      backups: jest.fn<CliHandlers['backups']>().mockResolvedValue(0),
      detect: jest.fn<CliHandlers['detect']>().mockResolvedValue(0),
    };
    onExit = jest.fn<(code: number) => void>();
  });

  it('should dispatch link with global options given before the command', async () => {
    handlers.workflow.mockResolvedValue(2);
    const program = createProgram(handlers, onExit);

    await program.parseAsync(
      ['--verbose', '--backup-root', '/tmp/backups', 'link', '/game/Saves', '/cloud'],
      { from: 'user' }
    );

    expect(handlers.workflow).toHaveBeenCalledWith(
      { workflow: 'link', saveDir: '/game/Saves', cloudRoot: '/cloud' },
      { verbose: true, backupRoot: '/tmp/backups' }
    );
    expect(onExit).toHaveBeenCalledWith(2);
  });

  it('should dispatch migrate', async () => {
    const program = createProgram(handlers, onExit);

    await program.parseAsync(['migrate', '/game/Saves', '/cloud'], { from: 'user' });

    expect(handlers.workflow).toHaveBeenCalledWith(
      { workflow: 'migrate', saveDir: '/game/Saves', cloudRoot: '/cloud' },
      {}
    );
    expect(onExit).toHaveBeenCalledWith(0);
  });

  it('should pass an optional backup path to restore', async () => {
    const program = createProgram(handlers, onExit);

    await program.parseAsync(['restore', '/game/Saves', '/backups/Saves-backup-20240105-070809'], {
      from: 'user',
    });

    expect(handlers.workflow).toHaveBeenCalledWith(
      {
        workflow: 'restore',
        saveDir: '/game/Saves',
        backupPath: '/backups/Saves-backup-20240105-070809',
      },
      {}
    );
  });

  it('should leave the backup path unset when restore gets none', async () => {
    const program = createProgram(handlers, onExit);

    await program.parseAsync(['restore', '/game/Saves'], { from: 'user' });

    expect(handlers.workflow).toHaveBeenCalledWith(
      { workflow: 'restore', saveDir: '/game/Saves', backupPath: undefined },
      {}
    );
  });

  it('should route backups and detect with their options', async () => {
    handlers.detect.mockResolvedValue(1);
    const program = createProgram(handlers, onExit);

    await program.parseAsync(['--game', 'pong', 'detect'], { from: 'user' });

    expect(handlers.detect).toHaveBeenCalledWith({ game: 'pong' });
    expect(handlers.backups).not.toHaveBeenCalled();
    expect(onExit).toHaveBeenCalledWith(1);
  });
});
