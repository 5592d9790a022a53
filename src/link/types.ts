/**
 * Platform link abstraction
 * The one point where POSIX and Windows diverge: how a directory link is
 * created, detected and removed.
 */

export type HostPlatform = 'darwin' | 'win32' | 'linux';

export type LinkKind = 'symlink' | 'junction';

export interface LinkStrategy {
  readonly kind: LinkKind;
  /**
   * Create a directory link at linkPath resolving to targetPath.
   * Throws LinkCreationError carrying the native diagnostic text.
   */
  createLink(linkPath: string, targetPath: string): Promise<void>;
  /** False (never an error) when the path does not exist */
  isLink(path: string): Promise<boolean>;
  /** Removes the link entry only; no-op when missing or not a link */
  removeLink(path: string): Promise<void>;
}

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs an external program to completion without throwing on non-zero exit
 */
export type ProcessRunner = (file: string, args: string[]) => Promise<ProcessResult>;
