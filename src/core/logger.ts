/**
 * Logger utilities using chalk for colored output
 */

import chalk from 'chalk';

export interface LoggerOptions {
  verbose?: boolean;
  /** Send everything except `log` to stderr, keeping stdout for machine output. */
  stderr?: boolean;
}

export class Logger {
  private readonly verbose: boolean;
  private readonly stderr: boolean;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.stderr = options.stderr ?? false;
  }

  error(message: string, error?: Error): void {
    console.error(chalk.red(`✗ ${message}`));
    if (this.verbose && error) {
      console.error(chalk.gray(error.stack || error.message));
    }
  }

  info(message: string): void {
    this.write(chalk.blue(`ℹ ${message}`));
  }

  warn(message: string): void {
    this.write(chalk.yellow(`⚠ ${message}`));
  }

  debug(message: string): void {
    if (this.verbose) {
      this.write(chalk.gray(`[DEBUG] ${message}`));
    }
  }

  log(message: string): void {
    console.log(message);
  }

  private write(line: string): void {
    if (this.stderr) {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

/** The subset of the logger the analysis layer writes to. */
export type AnalysisLogger = Pick<Logger, 'debug' | 'info' | 'warn'>;

// Default logger instance, used by the CLI error wrapper
export const logger = new Logger();

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}
