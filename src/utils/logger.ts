// Licensed under the Hungry Ghost Hive License. See LICENSE.

import chalk from 'chalk';

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_NAMES.some(name => name === value);
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function formatTimestamp(): string {
  return new Date().toISOString().substring(11, 19);
}

// Every level goes to stderr: stdout is reserved for the MCP message stream.

export function debug(message: string, ...args: unknown[]): void {
  if (shouldLog('debug')) {
    console.error(chalk.gray(`[${formatTimestamp()}] DEBUG:`), message, ...args);
  }
}

export function info(message: string, ...args: unknown[]): void {
  if (shouldLog('info')) {
    console.error(chalk.blue(`[${formatTimestamp()}]`), message, ...args);
  }
}

export function success(message: string, ...args: unknown[]): void {
  if (shouldLog('info')) {
    console.error(chalk.green(`[${formatTimestamp()}] ✓`), message, ...args);
  }
}

export function warn(message: string, ...args: unknown[]): void {
  if (shouldLog('warn')) {
    console.error(chalk.yellow(`[${formatTimestamp()}] ⚠`), message, ...args);
  }
}

export function error(message: string, ...args: unknown[]): void {
  if (shouldLog('error')) {
    console.error(chalk.red(`[${formatTimestamp()}] ✗`), message, ...args);
  }
}

export function highlight(text: string): string {
  return chalk.cyan(text);
}
