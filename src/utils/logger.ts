import chalk from 'chalk';
import { promises as fs } from 'fs';
import { dirname } from 'path';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface LoggerOptions {
  /** Print debug lines and write them to the log file */
  debug?: boolean;
  /** Append every line to this file (only while debug is enabled) */
  logFile?: string;
  /** Suppress console output */
  silent?: boolean;
}

/**
 * Console logger used by the CLI and handed to the migration manager.
 * Debug output is opt-in; when a log file is configured every line is
 * appended to it with a timestamp.
 */
export class Logger {
  private readonly debugEnabled: boolean;
  private readonly logFile: string | null;
  private readonly silent: boolean;
  private pending: Promise<void> = Promise.resolve();

  constructor(options: LoggerOptions = {}) {
    this.debugEnabled = options.debug ?? isDebugEnv();
    this.logFile = options.logFile ?? null;
    this.silent = options.silent ?? false;
  }

  isDebugEnabled(): boolean {
    return this.debugEnabled;
  }

  /**
   * Resolves once every queued file write has been attempted
   */
  async flush(): Promise<void> {
    await this.pending;
  }

  private writeToFile(level: LogLevel, message: string, ...args: unknown[]): void {
    if (!this.logFile || !this.debugEnabled) return;

    const file = this.logFile;
    const timestamp = new Date().toISOString();
    const logLine = `[${timestamp}] [${level.toUpperCase()}] ${message}${args.length > 0 ? ' ' + args.map(formatArg).join(' ') : ''}\n`;

    this.pending = this.pending
      .then(async () => {
        await fs.mkdir(dirname(file), { recursive: true });
        await fs.appendFile(file, logLine, 'utf-8');
      })
      .catch((error: unknown) => {
        if (!this.silent) {
          console.error(chalk.red(`✗ Unable to write log file ${file}: ${formatArg(error)}`));
        }
      });
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.debugEnabled) return;
    if (!this.silent) {
      console.log(chalk.gray(message), ...args);
    }
    this.writeToFile(LogLevel.DEBUG, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.silent) {
      console.log(chalk.blueBright(message), ...args);
    }
    this.writeToFile(LogLevel.INFO, message, ...args);
  }

  success(message: string, ...args: unknown[]): void {
    if (!this.silent) {
      console.log(chalk.green(`✓ ${message}`), ...args);
    }
    this.writeToFile(LogLevel.INFO, `✓ ${message}`, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (!this.silent) {
      console.warn(chalk.yellow(`⚠ ${message}`), ...args);
    }
    this.writeToFile(LogLevel.WARN, `⚠ ${message}`, ...args);
  }

  error(message: string, error?: unknown): void {
    if (!this.silent) {
      console.error(chalk.red(`✗ ${message}`));
    }
    this.writeToFile(LogLevel.ERROR, `✗ ${message}`);

    if (error === undefined) return;

    if (error instanceof Error) {
      if (!this.silent) {
        console.error(chalk.red(error.message));
      }
      this.writeToFile(LogLevel.ERROR, error.message);
      if (this.debugEnabled && error.stack) {
        if (!this.silent) {
          console.error(chalk.white(error.stack));
        }
        this.writeToFile(LogLevel.ERROR, error.stack);
      }
    } else {
      if (!this.silent) {
        console.error(chalk.red(String(error)));
      }
      this.writeToFile(LogLevel.ERROR, String(error));
    }
  }
}

function isDebugEnv(): boolean {
  return process.env.MIGRATOR_DEBUG === 'true' || process.env.MIGRATOR_DEBUG === '1';
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.message;
  return typeof arg === 'object' ? JSON.stringify(arg) : String(arg);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}
