/**
 * Log Buffer
 *
 * Bounded in-memory record of recent log lines, kept for an admin view.
 * One instance is created at startup and handed to initializeLogging();
 * nothing reaches it through module state.
 */

import { LogLevel } from './LogLevel.js';
import { formatTimestamp } from './transports.js';

const DEFAULT_BUFFER_SIZE = 100;

export interface LogBufferEntry {
  level: LogLevel;
  component: string;
  message: string;
  date: Date;
}

export class LogBuffer {
  private entries: LogBufferEntry[] = [];

  constructor(private readonly maxSize: number = DEFAULT_BUFFER_SIZE) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`Log buffer size must be a positive integer, got ${maxSize}`);
    }
  }

  append(level: LogLevel, component: string, message: string, date: Date = new Date()): void {
    this.entries.push({ level, component, message, date });
    if (this.entries.length > this.maxSize) {
      this.entries.shift();
    }
  }

  /**
   * Formatted lines, oldest first: `2026-01-02 03:04:05,006 INFO: [auth] message`
   */
  getMessages(): string[] {
    return this.entries.map(
      (entry) => `${formatTimestamp(entry.date)} ${entry.level}: [${entry.component}] ${entry.message}`
    );
  }

  getEntries(): readonly LogBufferEntry[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
  }
}
