/**
 * Env var parsers and data directory resolution
 */

import { resolve, dirname } from 'node:path';
import { homedir } from 'node:os';
import { fileURLToPath } from 'node:url';

const moduleDir = dirname(fileURLToPath(import.meta.url));

/** Repository (or installed package) root */
export const projectRoot = resolve(moduleDir, '../../..');

/**
 * '1' and 'true' (any case) are true; any other non-empty value is false
 */
export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value === '1' || value.toLowerCase() === 'true';
}

/**
 * Numeric env var; unparseable input keeps the default
 */
export function parseNumber(
  value: string | undefined,
  defaultValue: number,
  integer = false
): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = integer ? parseInt(value, 10) : parseFloat(value);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Case-insensitive match against `allowedValues`; no match keeps the default
 */
export function parseChoice(
  value: string | undefined,
  defaultValue: string,
  allowedValues: readonly string[]
): string {
  if (value === undefined || value === '') return defaultValue;
  const lower = value.toLowerCase();
  return allowedValues.includes(lower) ? lower : defaultValue;
}

export function expandTilde(filePath: string): string {
  if (filePath === '~' || filePath.startsWith('~/')) {
    return filePath.replace(/^~/, homedir());
  }
  return filePath;
}

/**
 * DATAFLAG_DATA_DIR if set, ~/.dataflag when running from node_modules,
 * otherwise ./data under the project root.
 */
export function getDataDir(): string {
  const fromEnv = process.env.DATAFLAG_DATA_DIR;
  if (fromEnv) {
    return expandTilde(fromEnv);
  }
  if (moduleDir.includes('node_modules')) {
    return resolve(homedir(), '.dataflag');
  }
  return resolve(projectRoot, 'data');
}

/**
 * An explicit value wins (':memory:' untouched); otherwise `relativePath`
 * under the data dir.
 */
export function resolveDataPath(envValue: string | undefined, relativePath: string): string {
  if (envValue) {
    return envValue === ':memory:' ? envValue : expandTilde(envValue);
  }
  return resolve(getDataDir(), relativePath);
}
