/**
 * Project configuration
 *
 * An optional `rocket.json` next to the document sets defaults that command
 * line flags may override:
 *
 *   { "version": "3.4.0", "maxDepth": 32 }
 */

import * as fs from 'fs';
import * as path from 'path';
import { FileIOError, InvalidArgumentError } from './errors.js';

export const CONFIG_FILE = 'rocket.json';

export interface ProjectConfig {
  version?: string;
  maxDepth?: number;
}

/**
 * Validate a parsed configuration object
 */
export function parseProjectConfig(raw: unknown, file: string = CONFIG_FILE): ProjectConfig {
  const location = { file, line: 1, column: 1 };
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new InvalidArgumentError(`${file} must contain a JSON object`, { location });
  }

  const config: ProjectConfig = {};
  const fields = new Map<string, unknown>(Object.entries(raw));

  const version = fields.get('version');
  if (version !== undefined) {
    if (typeof version !== 'string') {
      throw new InvalidArgumentError(`${file}: "version" must be a string`, { location });
    }
    config.version = version;
  }

  const maxDepth = fields.get('maxDepth');
  if (maxDepth !== undefined) {
    if (typeof maxDepth !== 'number' || !Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new InvalidArgumentError(`${file}: "maxDepth" must be a positive integer`, { location });
    }
    config.maxDepth = maxDepth;
  }

  return config;
}

/**
 * Read `rocket.json` from `dir`; an absent file means an empty configuration
 */
export function loadProjectConfig(dir: string): ProjectConfig {
  const file = path.join(dir, CONFIG_FILE);
  if (!fs.existsSync(file)) {
    return {};
  }

  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (e) {
    throw new FileIOError(file, { cause: e });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new InvalidArgumentError(`${file} is not valid JSON`, {
      location: { file, line: 1, column: 1 },
      cause: e,
    });
  }

  return parseProjectConfig(raw, file);
}
