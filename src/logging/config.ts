/**
 * Logging Configuration
 *
 * Derived from environment variables, cached after the first read.
 */

import { LogLevel, parseLogLevel } from './LogLevel.js';

export interface LoggingConfiguration {
  /** Minimum log level (LOG_LEVEL env, default INFO) */
  logLevel: LogLevel;
  /** Per-component overrides (DAV_DEBUG_COMPONENTS env, comma-separated `name[:LEVEL]`) */
  debugComponents: string[];
  /** Output format (LOG_FORMAT env, default 'text') */
  logFormat: 'text' | 'json';
  /** Optional file to append to (LOG_FILE env) */
  logFile?: string;
  /** Colorize level names; defaults to whether stdout is a TTY (LOG_COLORS env) */
  useColors: boolean;
}

let cachedConfig: LoggingConfiguration | null = null;

function parseFormat(value: string | undefined): 'text' | 'json' {
  return value === 'json' ? 'json' : 'text';
}

function parseColors(value: string | undefined): boolean {
  if (value === undefined || value === '') return process.stdout.isTTY === true;
  return value === '1' || value.toLowerCase() === 'true';
}

function parseDebugComponents(value: string | undefined): string[] {
  if (!value || value.trim() === '') return [];
  return value
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

export function getLoggingConfig(): LoggingConfiguration {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    logLevel: parseLogLevel(process.env['LOG_LEVEL'] ?? 'INFO'),
    debugComponents: parseDebugComponents(process.env['DAV_DEBUG_COMPONENTS']),
    logFormat: parseFormat(process.env['LOG_FORMAT']),
    logFile: process.env['LOG_FILE'] || undefined,
    useColors: parseColors(process.env['LOG_COLORS']),
  };

  return cachedConfig;
}

/**
 * Reset cached configuration (for testing)
 */
export function resetLoggingConfig(): void {
  cachedConfig = null;
}
