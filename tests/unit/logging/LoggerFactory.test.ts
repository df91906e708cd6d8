import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  getGlobalLevel,
  getLogger,
  initializeLogging,
  resetLogging,
  setGlobalLevel,
} from '../../../src/logging/LoggerFactory.js';
import { getLoggingConfig, resetLoggingConfig } from '../../../src/logging/config.js';
import { getEffectiveLevel, resetDebugRegistry, setComponentLevel } from '../../../src/logging/DebugModeRegistry.js';
import { LogBuffer } from '../../../src/logging/LogBuffer.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';
import { colorLevel, formatTimestamp } from '../../../src/logging/transports.js';

function recorded(buffer: LogBuffer): string[] {
  return buffer.getEntries().map((e) => `${e.level} [${e.component}] ${e.message}`);
}

describe('LoggerFactory', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    resetLogging();
    resetLoggingConfig();
    resetDebugRegistry();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    resetLogging();
    resetLoggingConfig();
    resetDebugRegistry();
  });

  it('caches one logger per component', () => {
    expect(getLogger('auth')).toBe(getLogger('auth'));
    expect(getLogger('auth').getComponent()).toBe('auth');
    expect(getLogger('auth').child('digest').getComponent()).toBe('auth.digest');
  });

  it('records emitted lines in the injected buffer', () => {
    const buffer = new LogBuffer();
    initializeLogging(buffer);
    setGlobalLevel(LogLevel.INFO);

    getLogger('auth').info('Registered user: alice');
    getLogger('http').error('send failed', new Error('boom'));

    expect(recorded(buffer)).toEqual(['INFO [auth] Registered user: alice', 'ERROR [http] send failed: boom']);
  });

  it('routes loggers created before initialization to the new buffer', () => {
    const early = getLogger('listing');
    const buffer = new LogBuffer();
    initializeLogging(buffer);
    setGlobalLevel(LogLevel.INFO);

    early.info('hello');

    expect(recorded(buffer)).toEqual(['INFO [listing] hello']);
  });

  it('filters by the global level', () => {
    const buffer = new LogBuffer();
    initializeLogging(buffer);
    setGlobalLevel(LogLevel.WARN);

    const logger = getLogger('response');
    logger.info('dropped');
    logger.warn('kept');

    expect(recorded(buffer)).toEqual(['WARN [response] kept']);
    expect(logger.isDebugEnabled()).toBe(false);
  });

  it('applies per-component overrides to children', () => {
    const buffer = new LogBuffer();
    initializeLogging(buffer);
    setGlobalLevel(LogLevel.INFO);
    setComponentLevel('auth', LogLevel.DEBUG);

    getLogger('auth.digest').debug('expected digest');
    getLogger('response').debug('dropped');

    expect(recorded(buffer)).toEqual(['DEBUG [auth.digest] expected digest']);
    expect(getLogger('auth.digest').isDebugEnabled()).toBe(true);
  });

  it('applies LOG_LEVEL to the first level check without explicit initialization', () => {
    process.env['LOG_LEVEL'] = 'DEBUG';

    expect(getLogger('auth').isDebugEnabled()).toBe(true);
    expect(getGlobalLevel()).toBe(LogLevel.DEBUG);
  });

  it('drops lines below LOG_LEVEL from the first write on', () => {
    process.env['LOG_LEVEL'] = 'ERROR';
    const logger = getLogger('auth');

    logger.info('Registered user: alice');

    expect(logger.isDebugEnabled()).toBe(false);
    expect(getGlobalLevel()).toBe(LogLevel.ERROR);
  });

  it('keeps a level set before the first write', () => {
    process.env['LOG_LEVEL'] = 'ERROR';
    setGlobalLevel(LogLevel.DEBUG);

    getLogger('auth').trace('parsed digest fields');

    expect(getGlobalLevel()).toBe(LogLevel.DEBUG);
    expect(getLogger('auth').isDebugEnabled()).toBe(true);
  });

  it('takes the global level and overrides from the environment', () => {
    process.env['LOG_LEVEL'] = 'DEBUG';
    process.env['DAV_DEBUG_COMPONENTS'] = 'listing:TRACE';
    resetLoggingConfig();

    initializeLogging();

    expect(getGlobalLevel()).toBe(LogLevel.DEBUG);
    expect(getEffectiveLevel('listing', LogLevel.INFO)).toBe(LogLevel.TRACE);
  });
});

describe('getLoggingConfig', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    resetLoggingConfig();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    resetLoggingConfig();
  });

  it('uses defaults when nothing is set', () => {
    delete process.env['LOG_LEVEL'];
    delete process.env['LOG_FORMAT'];
    delete process.env['LOG_FILE'];
    delete process.env['DAV_DEBUG_COMPONENTS'];

    const config = getLoggingConfig();

    expect(config.logLevel).toBe(LogLevel.INFO);
    expect(config.logFormat).toBe('text');
    expect(config.logFile).toBeUndefined();
    expect(config.debugComponents).toEqual([]);
  });

  it('reads every variable', () => {
    process.env['LOG_LEVEL'] = 'warn';
    process.env['LOG_FORMAT'] = 'json';
    process.env['LOG_FILE'] = '/var/log/dav.log';
    process.env['LOG_COLORS'] = 'true';
    process.env['DAV_DEBUG_COMPONENTS'] = ' auth , response:TRACE ,';

    expect(getLoggingConfig()).toEqual({
      logLevel: LogLevel.WARN,
      logFormat: 'json',
      logFile: '/var/log/dav.log',
      useColors: true,
      debugComponents: ['auth', 'response:TRACE'],
    });
  });

  it('caches until reset', () => {
    process.env['LOG_LEVEL'] = 'ERROR';
    const first = getLoggingConfig();
    process.env['LOG_LEVEL'] = 'DEBUG';

    expect(getLoggingConfig()).toBe(first);
    resetLoggingConfig();
    expect(getLoggingConfig().logLevel).toBe(LogLevel.DEBUG);
  });
});

describe('transports', () => {
  it('formats timestamps as yyyy-MM-dd HH:mm:ss,SSS', () => {
    expect(formatTimestamp(new Date(2026, 10, 9, 8, 7, 6, 54))).toBe('2026-11-09 08:07:06,054');
  });

  it('pads level names to five characters', () => {
    expect(colorLevel('info', false)).toBe('INFO ');
    expect(colorLevel('error', false)).toBe('ERROR');
    expect(colorLevel('warn', true)).toContain('WARN ');
  });
});
