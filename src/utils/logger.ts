/**
 * 日志工具模块
 * 提供统一的日志接口，支持不同级别的日志输出
 *
 * stdout 被 MCP stdio 协议占用，所有日志写到 stderr
 */

import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARNING = 2,
  ERROR = 3,
}

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARNING':
    case 'WARN':
      return LogLevel.WARNING;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

export class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)) {
    this.level = level;
  }

  formatMessage(level: string, msg: string, error?: unknown): string {
    const timestamp = new Date().toISOString();
    let errorMsg = '';
    if (error instanceof Error) {
      errorMsg = ` - ${error.message}`;
    } else if (error !== undefined) {
      errorMsg = ` - ${String(error)}`;
    }
    return `[${level}] ${timestamp} - ${msg}${errorMsg}`;
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.level;
  }

  debug(msg: string): void {
    if (this.shouldLog(LogLevel.DEBUG) || process.env.DEBUG) {
      console.error(chalk.gray(this.formatMessage('DEBUG', msg)));
    }
  }

  info(msg: string): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.error(chalk.green(this.formatMessage('INFO', msg)));
    }
  }

  warning(msg: string): void {
    if (this.shouldLog(LogLevel.WARNING)) {
      console.error(chalk.yellow(this.formatMessage('WARN', msg)));
    }
  }

  error(msg: string, error?: unknown): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(chalk.red(this.formatMessage('ERROR', msg, error)));
      if (error instanceof Error && process.env.DEBUG) {
        console.error(error.stack);
      }
    }
  }
}

export const logger = new Logger();
