/**
 * Logger utility for the scoreboard
 */

import chalk from 'chalk';
import dayjs from 'dayjs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'critical';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  critical: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

let currentLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? 'info';

/**
 * Accepts our level names plus `warning`, which the CLI takes for `warn`.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.toLowerCase() === 'warning' ? 'warn' : value.toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function formatTimestamp(): string {
  return dayjs().format('YYYY-MM-DD HH:mm:ss');
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

export const logger = {
  debug(message: string, ...args: unknown[]): void {
    if (shouldLog('debug')) {
      console.log(
        chalk.gray(`${formatTimestamp()} - DEBUG - ${message}`),
        ...args
      );
    }
  },

  info(message: string, ...args: unknown[]): void {
    if (shouldLog('info')) {
      console.log(
        chalk.blue(`${formatTimestamp()} - INFO - ${message}`),
        ...args
      );
    }
  },

  warn(message: string, ...args: unknown[]): void {
    if (shouldLog('warn')) {
      console.log(
        chalk.yellow(`${formatTimestamp()} - WARN - ${message}`),
        ...args
      );
    }
  },

  error(message: string, ...args: unknown[]): void {
    if (shouldLog('error')) {
      console.error(
        chalk.red(`${formatTimestamp()} - ERROR - ${message}`),
        ...args
      );
    }
  },

  critical(message: string, ...args: unknown[]): void {
    if (shouldLog('critical')) {
      console.error(
        chalk.bgRed.white(`${formatTimestamp()} - CRITICAL - ${message}`),
        ...args
      );
    }
  },

  divider(): void {
    if (shouldLog('info')) {
      console.log(chalk.gray('═'.repeat(60)));
    }
  },
};
