/**
 * Workflow result contract and command interface
 */

import type { ErrorKind } from '../utils/errors.js';

/**
 * Uniform return value of every workflow.
 * Workflows never throw; failures come back with success=false.
 */
export interface OperationResult {
  success: boolean;
  message: string;
  /** Set by a successful link: the backup taken before the local folder was removed */
  backupPath?: string;
  /** Taxonomy entry of the failure, when success=false */
  errorKind?: ErrorKind;
}

export interface Command {
  execute(): Promise<OperationResult>;
  canUndo(): Promise<boolean>;
  undo(): Promise<OperationResult>;
}
