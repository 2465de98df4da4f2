/**
 * Environment configuration loader
 *
 * Reads process environment variables once at start-up into an AppConfig.
 * Credential shapes are checked later by the request authenticator; here we
 * only require that they are present.
 *
 * @module config/env
 */

import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { AppConfig } from '../types/foxess';
import { ConfigurationError } from '../utils/errors';
import { isLogLevel } from '../utils/logger';
import {
  DEFAULT_CACHE_DIR_NAME,
  DEFAULT_MEMORY_CACHE_SIZE,
  DEFAULT_TTL_SECONDS,
} from './cache';
import { DEFAULT_LANG, DEFAULT_TIMEOUT_SECONDS, FOXESS_API_BASE } from './foxess';

export type EnvSource = Record<string, string | undefined>;

const DEFAULT_PORT = 8787;

function firstOf(env: EnvSource, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return undefined;
}

function positiveInt(env: EnvSource, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const value = parseInt(raw, 10);
  if (isNaN(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer`, { variable: name });
  }
  return value;
}

function flag(env: EnvSource, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new ConfigurationError(`${name} must be true or false`, { variable: name });
}

/**
 * Build the runtime configuration from environment variables
 *
 * @throws ConfigurationError when credentials are missing or a tunable is malformed
 */
export function loadConfig(env: EnvSource = process.env): AppConfig {
  const apiToken = firstOf(env, 'FOXESS_API_KEY', 'API_TOKEN');
  if (!apiToken) {
    throw new ConfigurationError('FOXESS_API_KEY environment variable is required', {
      variable: 'FOXESS_API_KEY',
    });
  }

  const deviceSerial = firstOf(env, 'FOXESS_DEVICE_SN', 'DEVICE_SERIAL');
  if (!deviceSerial) {
    throw new ConfigurationError('FOXESS_DEVICE_SN environment variable is required', {
      variable: 'FOXESS_DEVICE_SN',
    });
  }

  const logLevel = env.LOG_LEVEL?.trim().toLowerCase() || 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`Unknown LOG_LEVEL: ${logLevel}`, { variable: 'LOG_LEVEL' });
  }

  const diskDisabled = flag(env, 'CACHE_DISABLE_DISK', false);

  return {
    environment: env.ENVIRONMENT?.trim() || 'production',
    port: positiveInt(env, 'PORT', DEFAULT_PORT),
    allowedOrigins: (env.ALLOWED_ORIGINS ?? '')
      .split(',')
      .map((o) => o.trim())
      .filter((o) => o.length > 0),
    logLevel,
    foxess: {
      apiToken,
      deviceSerial,
      baseUrl: (env.FOXESS_API_BASE?.trim() || FOXESS_API_BASE).replace(/\/+$/, ''),
      timeoutSeconds: positiveInt(env, 'FOXESS_REQUEST_TIMEOUT_SECONDS', DEFAULT_TIMEOUT_SECONDS),
      lang: env.FOXESS_LANG?.trim() || DEFAULT_LANG,
    },
    cache: {
      memoryCacheSize: positiveInt(env, 'CACHE_MEMORY_SIZE', DEFAULT_MEMORY_CACHE_SIZE),
      defaultTtl: positiveInt(env, 'CACHE_DEFAULT_TTL', DEFAULT_TTL_SECONDS),
      diskCacheDir: diskDisabled
        ? null
        : env.CACHE_DIR?.trim() || join(tmpdir(), DEFAULT_CACHE_DIR_NAME),
      enableEncryption: flag(env, 'CACHE_ENCRYPTION', true),
      passphrase: env.FOXESS_CACHE_KEY || undefined,
    },
  };
}
