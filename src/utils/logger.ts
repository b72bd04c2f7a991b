/**
 * Logging utility
 */

import chalk from 'chalk';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

export class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = 'error') {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] <= LOG_LEVELS[this.level];
  }

  error(message: string, error?: Error): void {
    console.error(chalk.red(`✖ ${message}`));
    if (error && this.shouldLog('debug')) {
      console.error(chalk.gray(error.stack || error.message));
    }
  }

  warn(message: string, data?: object): void {
    if (this.shouldLog('warn')) {
      console.warn(chalk.yellow(`⚠ ${message}`));
      if (data && this.shouldLog('debug')) {
        console.warn(chalk.gray(JSON.stringify(data, null, 2)));
      }
    }
  }

  info(message: string): void {
    if (this.shouldLog('info')) {
      console.log(chalk.blue(`ℹ ${message}`));
    }
  }

  debug(message: string, data?: object): void {
    if (this.shouldLog('debug')) {
      console.log(chalk.gray(`● ${message}`));
      if (data) {
        console.log(chalk.gray(JSON.stringify(data, null, 2)));
      }
    }
  }

  success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  }
}

// singleton
export const logger = new Logger(isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'error');
