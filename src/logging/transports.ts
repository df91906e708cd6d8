/**
 * Logging Transports
 *
 * Winston transport factories. Text lines look like:
 *   INFO  2026-02-10 14:30:15,042 [auth] Registered user: alice
 */

import chalk from 'chalk';
import winston from 'winston';

export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

const LEVEL_COLORS: Record<string, chalk.Chalk> = {
  trace: chalk.gray,
  debug: chalk.cyan,
  info: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
};

/**
 * yyyy-MM-dd HH:mm:ss,SSS in local time.
 */
export function formatTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  const millis = String(date.getMilliseconds()).padStart(3, '0');
  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds},${millis}`;
}

export function colorLevel(level: string, useColors: boolean): string {
  const label = level.toUpperCase().padEnd(5);
  const color = LEVEL_COLORS[level.toLowerCase()];
  return useColors && color ? color(label) : label;
}

function buildTextFormat(useColors: boolean): winston.Logform.Format {
  return winston.format.printf((info) => {
    const component = info['component'];
    const componentPart = typeof component === 'string' ? ` [${component}]` : '';
    const errorStack = info['errorStack'];
    let line = `${colorLevel(info.level, useColors)} ${formatTimestamp(new Date())}${componentPart} ${String(info.message)}`;
    if (typeof errorStack === 'string') {
      line += '\n' + errorStack;
    }
    return line;
  });
}

function buildFormat(format: 'text' | 'json', useColors: boolean): winston.Logform.Format {
  if (format === 'json') {
    return winston.format.combine(winston.format.timestamp(), winston.format.json());
  }
  return buildTextFormat(useColors);
}

export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(
    private format: 'text' | 'json',
    private useColors: boolean
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.Console({
      format: buildFormat(this.format, this.useColors),
      stderrLevels: [],
    });
  }
}

/**
 * File transport with size-based rotation. Never colorized.
 */
export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private filePath: string,
    private format: 'text' | 'json'
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.File({
      filename: this.filePath,
      format: buildFormat(this.format, false),
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
    });
  }
}
