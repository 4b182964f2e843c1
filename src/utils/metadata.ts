/**
 * Metadata validation for flags and opinions.
 *
 * Recognised keys are type-checked; everything else passes through.
 */

import { FREQ_CHANNELS, INSTRUMENT_INPUTS, INSTRUMENTS, type DataMetadata } from '../db/schema.js';
import { createValidationError, ErrorCodes } from '../core/errors.js';
import { isIndexList, isInstrument, isObject, isString } from './type-guards.js';

function invalid(field: string, message: string, suggestion?: string): never {
  throw createValidationError(field, message, suggestion, ErrorCodes.INVALID_METADATA);
}

/**
 * Validate raw metadata and narrow it to DataMetadata.
 *
 * @throws ValidationError when the value is not a mapping or a recognised key is malformed
 */
export function validateMetadata(raw: unknown, field = 'metadata'): DataMetadata {
  if (!isObject(raw)) {
    invalid(field, 'must be a key-value mapping');
  }

  const { instrument, freq, inputs, description, user, ...rest } = raw;
  const metadata: DataMetadata = {};
  for (const [key, value] of Object.entries(rest)) {
    metadata[key] = value;
  }

  if (instrument !== undefined) {
    if (!isInstrument(instrument)) {
      invalid(`${field}.instrument`, `unknown instrument "${String(instrument)}"`, `use one of ${INSTRUMENTS.join(', ')}`);
    }
    metadata.instrument = instrument;
  }

  if (freq !== undefined) {
    if (!isIndexList(freq)) {
      invalid(`${field}.freq`, 'must be a list of non-negative integers');
    }
    const outOfRange = freq.find((f) => f >= FREQ_CHANNELS);
    if (outOfRange !== undefined) {
      invalid(`${field}.freq`, `index ${outOfRange} outside 0-${FREQ_CHANNELS - 1}`);
    }
    metadata.freq = [...freq];
  }

  if (inputs !== undefined) {
    if (!isIndexList(inputs)) {
      invalid(`${field}.inputs`, 'must be a list of non-negative integers');
    }
    if (metadata.instrument !== undefined) {
      const limit = INSTRUMENT_INPUTS[metadata.instrument];
      const outOfRange = inputs.find((i) => i >= limit);
      if (outOfRange !== undefined) {
        invalid(`${field}.inputs`, `index ${outOfRange} outside 0-${limit - 1} for ${metadata.instrument}`);
      }
    }
    metadata.inputs = [...inputs];
  }

  if (description !== undefined) {
    if (!isString(description)) {
      invalid(`${field}.description`, 'must be a string');
    }
    metadata.description = description;
  }

  if (user !== undefined) {
    if (!isString(user)) {
      invalid(`${field}.user`, 'must be a string');
    }
    metadata.user = user;
  }

  return metadata;
}
