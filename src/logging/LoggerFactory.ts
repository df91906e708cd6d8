/**
 * Logger Factory
 *
 * Creates the root winston logger and caches one Logger per component.
 *
 *   initializeLogging(new LogBuffer());   // at startup, optional
 *   const logger = getLogger('auth');
 *   logger.info('Registered user: alice');
 */

import winston from 'winston';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import type { LogBuffer } from './LogBuffer.js';
import { LogLevel } from './LogLevel.js';
import { Logger, setGlobalLevelProvider, setSinkProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

/** Lower number is higher priority in winston */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function toWinstonLevel(level: LogLevel): string {
  return level.toLowerCase();
}

let rootLogger: winston.Logger | null = null;
let logBuffer: LogBuffer | null = null;
let currentGlobalLevel: LogLevel = LogLevel.INFO;
const loggerCache = new Map<string, Logger>();

/**
 * Initialize logging. If a logger writes first, defaults are used
 * (console transport, INFO, no buffer). Existing loggers follow the new setup.
 */
export function initializeLogging(buffer?: LogBuffer | null, additionalTransports?: LogTransport[]): void {
  const config = getLoggingConfig();

  currentGlobalLevel = config.logLevel;
  logBuffer = buffer ?? null;

  const transports: winston.transport[] = [
    new ConsoleTransport(config.logFormat, config.useColors).createWinstonTransport(),
  ];
  if (config.logFile) {
    transports.push(new FileTransport(config.logFile, config.logFormat).createWinstonTransport());
  }
  for (const t of additionalTransports ?? []) {
    transports.push(t.createWinstonTransport());
  }

  const logger = winston.createLogger({
    levels: WINSTON_LEVELS,
    // winston filters nothing; Logger applies global and per-component levels
    level: 'trace',
    transports,
    exitOnError: false,
  });
  rootLogger = logger;

  initFromEnv(config.debugComponents);
}

function ensureInitialized(): winston.Logger {
  if (!rootLogger) {
    initializeLogging();
  }
  if (!rootLogger) {
    throw new Error('Logging failed to initialize');
  }
  return rootLogger;
}

// The first level check or write initializes logging, so LOG_LEVEL applies from the start
setGlobalLevelProvider(() => {
  ensureInitialized();
  return currentGlobalLevel;
});
setSinkProvider(() => ({ winstonLogger: ensureInitialized(), buffer: logBuffer }));

export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const logger = new Logger(component);
  loggerCache.set(component, logger);
  return logger;
}

export function setGlobalLevel(level: LogLevel): void {
  ensureInitialized();
  currentGlobalLevel = level;
}

export function getGlobalLevel(): LogLevel {
  ensureInitialized();
  return currentGlobalLevel;
}

/**
 * Flush pending writes and close transports.
 */
export async function shutdownLogging(): Promise<void> {
  const logger = rootLogger;
  if (!logger) return;
  await new Promise<void>((resolve) => {
    logger.on('finish', () => resolve());
    logger.end();
  });
  rootLogger = null;
}

/**
 * Reset all logging state (for testing). Cached loggers stay valid and
 * lazily reinitialize on their next write.
 */
export function resetLogging(): void {
  rootLogger?.close();
  rootLogger = null;
  logBuffer = null;
  currentGlobalLevel = LogLevel.INFO;
}
