/**
 * Shared type definitions for database schema
 */

/**
 * Opinion decision enum
 */
export const DECISIONS = ['good', 'bad', 'unsure'] as const;
export type Decision = (typeof DECISIONS)[number];

/**
 * Instruments a flag or opinion may target, with the size of their input mask
 */
export const INSTRUMENT_INPUTS = {
  chime: 2048,
  pathfinder: 256,
} as const;
export type Instrument = keyof typeof INSTRUMENT_INPUTS;
export const INSTRUMENTS: readonly Instrument[] = ['chime', 'pathfinder'];

/**
 * Number of frequency channels in a frequency mask
 */
export const FREQ_CHANNELS = 1024;

/**
 * Structured metadata stored on flags and opinions.
 *
 * `freq` and `inputs` are sparse index lists; when absent the flag applies to
 * every frequency / input. Unrecognised keys are passed through untouched.
 */
export interface DataMetadata {
  instrument?: Instrument;
  freq?: number[];
  inputs?: number[];
  description?: string;
  user?: string;
  [key: string]: unknown;
}

/**
 * Free-form JSON mapping stored on catalog entries
 */
export type JsonObject = Record<string, unknown>;

/**
 * Maximum length of a voting mode name (width of votes.mode)
 */
export const MAX_MODE_NAME_LENGTH = 32;

/**
 * Maximum length of a revision name
 */
export const MAX_REVISION_NAME_LENGTH = 32;

/**
 * Maximum length of a flag / opinion / category type name
 */
export const MAX_TYPE_NAME_LENGTH = 64;
