import { readFileSync, existsSync } from 'node:fs';
import { createLogger, isLogLevel, type LogLevel } from '../logging/logger.js';

const logger = createLogger('config');

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
export function readSecret(envVar: string): string | undefined {
  // Check for file-based secret first (Docker secrets pattern)
  const fileEnvVar = `${envVar}_FILE`;
  const filePath = process.env[fileEnvVar];

  if (filePath && existsSync(filePath)) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch (error) {
      logger.warn('Could not read secret file', { variable: fileEnvVar, path: filePath, error: String(error) });
    }
  }

  // Fall back to direct environment variable
  return readString(envVar);
}

/**
 * Environment variable, with the empty string treated as unset
 */
export function readString(envVar: string): string | undefined {
  const raw = process.env[envVar];
  return raw === undefined || raw === '' ? undefined : raw;
}

export function readInt(envVar: string, fallback: number): number {
  const raw = readString(envVar);
  if (raw === undefined) {
    return fallback;
  }
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? fallback : value;
}

export function readBoolean(envVar: string, fallback: boolean): boolean {
  const raw = readString(envVar);
  if (raw === undefined) {
    return fallback;
  }
  return raw === 'true' || raw === '1';
}

export function readLogLevel(): LogLevel {
  const raw = process.env['LOG_LEVEL'] ?? 'info';
  return isLogLevel(raw) ? raw : 'info';
}
