/**
 * Type guard utilities for runtime type validation
 *
 * Used to validate CLI input and stored metadata without unsafe casting.
 */

import { DECISIONS, INSTRUMENT_INPUTS, type Decision, type Instrument } from '../db/schema.js';

/**
 * Type guard to check if a value is a string
 */
export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

/**
 * Type guard to check if a value is a number
 */
export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !isNaN(value);
}

/**
 * Type guard to check if a value is an object (not null, not array)
 */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Type guard to check if a value is an array
 */
export function isArray(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

export function isDecision(value: unknown): value is Decision {
  return isString(value) && DECISIONS.some((d) => d === value);
}

export function isInstrument(value: unknown): value is Instrument {
  return isString(value) && Object.prototype.hasOwnProperty.call(INSTRUMENT_INPUTS, value);
}

/**
 * Type guard for an integer (LSDs may be negative before the epoch)
 */
export function isInteger(value: unknown): value is number {
  return isNumber(value) && Number.isInteger(value);
}

/**
 * Type guard for non-negative integer (mask indices)
 */
export function isNonNegativeInteger(value: unknown): value is number {
  return isInteger(value) && value >= 0;
}

/**
 * Type guard for a list of non-negative integers
 */
export function isIndexList(value: unknown): value is number[] {
  return isArray(value) && value.every(isNonNegativeInteger);
}
