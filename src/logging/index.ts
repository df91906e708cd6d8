export { LogLevel, parseLogLevel, isLevelEnabled } from './LogLevel.js';
export { LogBuffer, type LogBufferEntry } from './LogBuffer.js';
export { Logger } from './Logger.js';
export {
  getLogger,
  getGlobalLevel,
  initializeLogging,
  resetLogging,
  setGlobalLevel,
  shutdownLogging,
} from './LoggerFactory.js';
export {
  clearComponentLevel,
  getEffectiveLevel,
  resetDebugRegistry,
  setComponentLevel,
} from './DebugModeRegistry.js';
export { getLoggingConfig, resetLoggingConfig, type LoggingConfiguration } from './config.js';
export { ConsoleTransport, FileTransport, colorLevel, formatTimestamp, type LogTransport } from './transports.js';
