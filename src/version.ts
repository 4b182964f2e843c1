/**
 * Package version, read once from package.json
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { isObject, isString } from './utils/type-guards.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  // src/ and dist/ both sit one level below package.json
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8'));
  return isObject(packageJson) && isString(packageJson.version) ? packageJson.version : '0.0.0';
}

export const VERSION: string = readVersion();
