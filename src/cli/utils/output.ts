/**
 * CLI Output Formatting
 *
 * Provides JSON and table output formatting for CLI commands.
 */

import { isArray, isObject } from '../../utils/type-guards.js';

export type OutputFormat = 'json' | 'table';

/**
 * Format result based on output mode
 */
export function formatOutput(result: unknown, format: OutputFormat = 'json'): string {
  if (format === 'json') {
    return JSON.stringify(result, null, 2);
  }

  return formatAsTable(result);
}

/**
 * List keys recognised in response objects, in lookup order
 */
const LIST_KEYS = [
  'flags',
  'opinions',
  'votes',
  'revisions',
  'flagTypes',
  'opinionTypes',
  'categories',
  'users',
];

function formatAsTable(result: unknown): string {
  if (isArray(result)) {
    return formatArrayAsTable(result);
  }
  if (!isObject(result)) {
    return String(result);
  }

  for (const key of LIST_KEYS) {
    const items = result[key];
    if (isArray(items)) {
      return formatHeader(result) + formatArrayAsTable(items);
    }
  }

  // Single object - format as key-value pairs
  return formatObjectAsKeyValue(result);
}

function formatArrayAsTable(items: unknown[]): string {
  if (items.length === 0) return '(no results)';

  const rows = items.filter(isObject);
  const first = rows[0];
  if (!first) {
    return items.map(String).join('\n');
  }

  const allKeys = Object.keys(first);
  const priorityKeys = ['id', 'name', 'typeName', 'userName', 'lsd', 'decision', 'startTime', 'finishTime'];
  const keys = priorityKeys.filter((k) => allKeys.includes(k));

  // Add remaining keys up to max 8 columns
  for (const k of allKeys) {
    if (!keys.includes(k) && keys.length < 8) {
      keys.push(k);
    }
  }

  const maxWidths = calculateColumnWidths(rows, keys);

  const header = keys.map((k, i) => k.padEnd(maxWidths[i] ?? k.length)).join(' | ');
  const separator = keys.map((k, i) => '-'.repeat(maxWidths[i] ?? k.length)).join('-+-');

  const lines = rows.map((row) =>
    keys
      .map((k, i) => {
        const val = formatValue(row[k]);
        const width = maxWidths[i] ?? k.length;
        return val.slice(0, width).padEnd(width);
      })
      .join(' | ')
  );

  return [header, separator, ...lines].join('\n');
}

export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'object') {
    const str = JSON.stringify(value);
    return str.length > 40 ? str.slice(0, 37) + '...' : str;
  }
  return String(value);
}

function calculateColumnWidths(items: Record<string, unknown>[], keys: string[]): number[] {
  return keys.map((key) => {
    const maxValue = Math.max(...items.map((item) => formatValue(item[key]).length));
    return Math.max(key.length, Math.min(maxValue, 40)); // Cap at 40 chars
  });
}

function formatHeader(obj: Record<string, unknown>): string {
  if ('count' in obj) {
    return `Count: ${String(obj.count)}\n\n`;
  }
  return '';
}

function formatObjectAsKeyValue(obj: Record<string, unknown>): string {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) continue;
    const formatted =
      typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
    lines.push(`${key}: ${formatted}`);
  }
  return lines.join('\n');
}
