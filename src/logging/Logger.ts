/**
 * Logger
 *
 * Component-bound wrapper around the root winston logger. Every emitted line
 * also lands in the LogBuffer when one was supplied at initialization.
 * Level filtering goes through DebugModeRegistry for per-component overrides.
 */

import winston from 'winston';
import { shouldLog } from './DebugModeRegistry.js';
import type { LogBuffer } from './LogBuffer.js';
import { LogLevel } from './LogLevel.js';

/**
 * Where emitted lines go. Resolved on every call so that loggers created at import
 * time follow a later initializeLogging().
 */
export interface LogSink {
  winstonLogger: winston.Logger;
  buffer: LogBuffer | null;
}

/** Injected by LoggerFactory to avoid a circular import */
let globalLevelFn: () => LogLevel = () => LogLevel.INFO;
let sinkFn: () => LogSink | null = () => null;

/**
 * @internal
 */
export function setGlobalLevelProvider(fn: () => LogLevel): void {
  globalLevelFn = fn;
}

/**
 * @internal
 */
export function setSinkProvider(fn: () => LogSink | null): void {
  sinkFn = fn;
}

export class Logger {
  constructor(private readonly component: string) {}

  trace(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.TRACE, 'trace', message, undefined, metadata);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.DEBUG, 'debug', message, undefined, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.INFO, 'info', message, undefined, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.WARN, 'warn', message, undefined, metadata);
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.ERROR, 'error', message, error, metadata);
  }

  isDebugEnabled(): boolean {
    return shouldLog(this.component, LogLevel.DEBUG, globalLevelFn());
  }

  /**
   * logger.child('digest') on "auth" yields "auth.digest"
   */
  child(subComponent: string): Logger {
    return new Logger(`${this.component}.${subComponent}`);
  }

  getComponent(): string {
    return this.component;
  }

  private logAt(
    level: LogLevel,
    winstonLevel: string,
    message: string,
    error?: Error,
    metadata?: Record<string, unknown>
  ): void {
    if (!shouldLog(this.component, level, globalLevelFn())) {
      return;
    }
    const sink = sinkFn();
    if (!sink) {
      return;
    }

    const meta: Record<string, unknown> = {
      component: this.component,
      ...metadata,
    };
    if (error?.stack) {
      meta['errorStack'] = error.stack;
    }
    sink.winstonLogger.log(winstonLevel, message, meta);

    sink.buffer?.append(level, this.component, error ? `${message}: ${error.message}` : message);
  }
}
