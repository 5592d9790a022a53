/**
 * Logger utility with verbose mode support
 * - info(): always prints (concise mode)
 * - debug(): only prints with --verbose
 * - createSink(): adapts tagged workflow lines to the console
 */

export interface LoggerConfig {
  verbose?: boolean;
  /** Prefix printed before every line (default: "[save-linker]") */
  prefix?: string;
}

/**
 * Receives one human-readable line per workflow state transition,
 * e.g. "[LINK] Copying saves to cloud folder..."
 */
export type LogSink = (line: string) => void;

const DEFAULT_PREFIX = '[save-linker]';

class Logger {
  private verbose: boolean = false;
  private readonly prefix: string;

  constructor(config?: LoggerConfig) {
    this.verbose = config?.verbose ?? false;
    this.prefix = config?.prefix ?? DEFAULT_PREFIX;
  }

  /**
   * Set verbose mode
   */
  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  /**
   * Always prints - used for concise summary lines
   */
  info(message: string): void {
    console.log(`${this.prefix} ${message}`);
  }

  /**
   * Only prints in verbose mode - used for detailed steps
   */
  debug(message: string): void {
    if (this.verbose) {
      console.log(`${this.prefix} DEBUG: ${message}`);
    }
  }

  warn(message: string): void {
    console.warn(`${this.prefix} WARNING: ${message}`);
  }

  error(message: string): void {
    console.error(`${this.prefix} ERROR: ${message}`);
  }

  /**
   * Build a sink for workflow log lines.
   * Lines tagged [ERROR] go to stderr, [SKIP] lines are warnings, the rest are info.
   */
  createSink(): LogSink {
    return (line: string) => {
      if (line.startsWith('[ERROR]')) {
        console.error(`${this.prefix} ${line}`);
      } else if (line.startsWith('[SKIP]')) {
        console.warn(`${this.prefix} ${line}`);
      } else {
        this.info(line);
      }
    };
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get or create the logger singleton
 */
export function getLogger(config?: LoggerConfig): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(config);
  } else if (config?.verbose !== undefined) {
    loggerInstance.setVerbose(config.verbose);
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}

/**
 * Sink that drops every line; the default when a caller supplies none
 */
export const silentSink: LogSink = () => {};

export { Logger };
