/**
 * Debug Mode Registry
 *
 * Per-component log level overrides, so that DEBUG/TRACE can be switched on for
 * e.g. "auth.digest" without flooding the rest of the output.
 */

import { LogLevel, isLevelEnabled, parseLogLevel } from './LogLevel.js';

const overrides = new Map<string, LogLevel>();

export function setComponentLevel(name: string, level: LogLevel): void {
  overrides.set(name, level);
}

export function clearComponentLevel(name: string): void {
  overrides.delete(name);
}

/**
 * The override for a component, or for its nearest dotted parent
 * ("auth.digest" inherits an override set on "auth").
 */
export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  let current = name;
  for (;;) {
    const level = overrides.get(current);
    if (level) return level;
    const dot = current.lastIndexOf('.');
    if (dot < 0) return globalLevel;
    current = current.substring(0, dot);
  }
}

export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return isLevelEnabled(messageLevel, getEffectiveLevel(name, globalLevel));
}

/**
 * Apply entries like ["auth", "response:TRACE"]. Entries without a level get DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      setComponentLevel(entry.substring(0, colonIndex), parseLogLevel(entry.substring(colonIndex + 1)));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

/**
 * Reset all registry state (for testing)
 */
export function resetDebugRegistry(): void {
  overrides.clear();
}
