/**
 * Derived boolean masks over flag metadata.
 *
 * Metadata stores sparse index lists; consumers want dense masks.
 */

import { FREQ_CHANNELS, INSTRUMENT_INPUTS, type DataMetadata } from '../db/schema.js';

function denseMask(length: number, indices: readonly number[] | undefined): boolean[] {
  if (indices === undefined) {
    return new Array<boolean>(length).fill(true);
  }
  const mask = new Array<boolean>(length).fill(false);
  for (const index of indices) {
    if (index >= 0 && index < length) {
      mask[index] = true;
    }
  }
  return mask;
}

/**
 * Frequency mask of length 1024: all true when no `freq` list is stored
 */
export function freqMask(metadata: DataMetadata | null | undefined): boolean[] {
  return denseMask(FREQ_CHANNELS, metadata?.freq);
}

/**
 * Input mask sized for the flag's instrument, or null when no instrument is set
 */
export function inputMask(metadata: DataMetadata | null | undefined): boolean[] | null {
  const instrument = metadata?.instrument;
  if (instrument === undefined) {
    return null;
  }
  return denseMask(INSTRUMENT_INPUTS[instrument], metadata?.inputs);
}
