/**
 * Option parsers for Commander.js
 */

import { InvalidArgumentError } from 'commander';

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer`);
  }
  return parsed;
}

export function parseTimestamp(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not a Unix timestamp`);
  }
  return parsed;
}

/**
 * "3,5,7" -> [3, 5, 7]
 */
export function parseIndexList(value: string): number[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(parseInteger);
}

export function parseJson(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    throw new InvalidArgumentError(`"${value}" is not valid JSON`);
  }
}

/**
 * Accumulator for repeatable string options
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export interface MetadataOptions {
  metadata?: unknown;
  instrument?: string;
  freq?: number[];
  inputs?: number[];
  description?: string;
}

/**
 * Merge --metadata JSON with the per-key convenience options.
 * Returns undefined when none were given.
 */
export function buildMetadata(options: MetadataOptions): unknown {
  const fields: Record<string, unknown> = {};
  if (options.instrument !== undefined) fields.instrument = options.instrument;
  if (options.freq !== undefined) fields.freq = options.freq;
  if (options.inputs !== undefined) fields.inputs = options.inputs;
  if (options.description !== undefined) fields.description = options.description;

  if (options.metadata === undefined) {
    return Object.keys(fields).length > 0 ? fields : undefined;
  }
  if (Object.keys(fields).length === 0) {
    return options.metadata;
  }
  if (typeof options.metadata !== 'object' || options.metadata === null || Array.isArray(options.metadata)) {
    // let validation report the malformed --metadata value
    return options.metadata;
  }
  return { ...options.metadata, ...fields };
}
