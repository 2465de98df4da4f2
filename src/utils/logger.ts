/**
 * Leveled console logger with API token masking
 */

import type { LogLevel } from '../types/foxess';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const TOKEN_IN_TEXT = /[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi;

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Mask anything shaped like an API token: first 8 and last 4 characters kept
 */
export function maskSecrets(text: string): string {
  return text.replace(TOKEN_IN_TEXT, (token) => `${token.slice(0, 8)}****${token.slice(-4)}`);
}

export interface Logger {
  debug(message: string, ...extra: unknown[]): void;
  info(message: string, ...extra: unknown[]): void;
  warn(message: string, ...extra: unknown[]): void;
  error(message: string, ...extra: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const write = (level: Exclude<LogLevel, 'silent'>, message: string, extra: unknown[]) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
    const line = `[${scope}] ${maskSecrets(message)}`;
    switch (level) {
      case 'debug':
        console.debug(line, ...extra);
        break;
      case 'info':
        console.info(line, ...extra);
        break;
      case 'warn':
        console.warn(line, ...extra);
        break;
      case 'error':
        console.error(line, ...extra);
        break;
    }
  };

  return {
    debug: (message, ...extra) => write('debug', message, extra),
    info: (message, ...extra) => write('info', message, extra),
    warn: (message, ...extra) => write('warn', message, extra),
    error: (message, ...extra) => write('error', message, extra),
  };
}
