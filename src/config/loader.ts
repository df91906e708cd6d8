/**
 * Configuration loading: validation of plain objects and YAML/JSON files.
 */

import * as fs from 'fs';
import yaml from 'js-yaml';
import type { ZodError } from 'zod';
import { ConfigError } from '../errors.js';
import { GatewayConfigSchema, type GatewayConfig } from './schema.js';

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate raw configuration and fill in defaults.
 * @throws ConfigError listing every failed field
 */
export function parseConfig(input: unknown): GatewayConfig {
  const result = GatewayConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigError('Invalid gateway configuration', formatIssues(result.error));
  }
  return result.data;
}

export function getDefaultConfig(): GatewayConfig {
  return parseConfig({});
}

/**
 * Load configuration from a YAML or JSON file (JSON parses as YAML).
 */
export function loadConfigFile(filePath: string): GatewayConfig {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let data: unknown;
  try {
    data = yaml.load(content, { filename: filePath });
  } catch (err) {
    throw new ConfigError(`Cannot parse config file ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseConfig(data);
}
