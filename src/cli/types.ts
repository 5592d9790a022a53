/**
 * CLI argument parsing types
 */

export interface GlobalOptions {
  backupRoot?: string;
  appName?: string;
  game?: string;
  verbose?: boolean;
}

/**
 * One workflow invocation. For migrate and link the target is the Saves
 * folder inside cloudRoot.
 */
export type WorkflowRequest =
  | { workflow: 'migrate' | 'link'; saveDir: string; cloudRoot: string }
  | { workflow: 'restore'; saveDir: string; backupPath?: string };

/**
 * Actions the program dispatches to; each resolves to a process exit code
 */
export interface CliHandlers {
  workflow(request: WorkflowRequest, options: GlobalOptions): Promise<number>;
  backups(options: GlobalOptions): Promise<number>;
  detect(options: GlobalOptions): Promise<number>;
}
