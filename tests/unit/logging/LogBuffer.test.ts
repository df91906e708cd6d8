import { describe, it, expect } from '@jest/globals';
import { LogBuffer } from '../../../src/logging/LogBuffer.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';

describe('LogBuffer', () => {
  it('formats lines with timestamp, level and component', () => {
    const buffer = new LogBuffer();
    buffer.append(LogLevel.INFO, 'auth', 'Registered user: alice', new Date(2026, 0, 2, 3, 4, 5, 6));

    expect(buffer.getMessages()).toEqual(['2026-01-02 03:04:05,006 INFO: [auth] Registered user: alice']);
  });

  it('keeps the newest entries, oldest first', () => {
    const buffer = new LogBuffer(3);
    for (let i = 0; i < 5; i++) {
      buffer.append(LogLevel.DEBUG, 'listing', `m${i}`);
    }

    expect(buffer.size).toBe(3);
    expect(buffer.getEntries().map((e) => e.message)).toEqual(['m2', 'm3', 'm4']);
  });

  it('holds 100 entries by default', () => {
    const buffer = new LogBuffer();
    for (let i = 0; i < 150; i++) {
      buffer.append(LogLevel.INFO, 'http', `m${i}`);
    }

    expect(buffer.size).toBe(100);
    expect(buffer.getEntries()[0]?.message).toBe('m50');
  });

  it('rejects a size that is not a positive integer', () => {
    expect(() => new LogBuffer(0)).toThrow(RangeError);
    expect(() => new LogBuffer(1.5)).toThrow(RangeError);
  });

  it('clears', () => {
    const buffer = new LogBuffer();
    buffer.append(LogLevel.WARN, 'auth', 'x');
    buffer.clear();

    expect(buffer.size).toBe(0);
    expect(buffer.getMessages()).toEqual([]);
  });
});
