/**
 * Config Registry Type Definitions
 *
 * Every option is described once: where it is read from, its default, how
 * the raw string is parsed and the zod schema the parsed value must pass.
 */

import type { z } from 'zod';

/**
 * Built-in conversions from an env var string
 */
export type ParserType =
  | 'string'
  | 'boolean' // '1' or 'true'
  | 'number'
  | 'int'
  | 'path'; // relative to the data dir

export type CustomParser<T> = (envValue: string | undefined, defaultValue: T) => T;

export interface ConfigOptionMeta<T = unknown> {
  /** e.g. 'DATAFLAG_DB_PATH' */
  envKey: string;
  defaultValue: T;
  /** Shown in the generated env var listing */
  description: string;
  schema: z.ZodType<T>;
  /** Inferred from the default value when omitted */
  parse?: ParserType | CustomParser<T>;
  /** Accepted values for a 'string' option; anything else falls back to the default */
  allowedValues?: readonly string[];
}

export interface ConfigSectionMeta {
  /** Key of the section in the built config */
  name: string;
  description: string;
  options: Record<string, ConfigOptionMeta>;
}

export interface ConfigRegistry {
  sections: Record<string, ConfigSectionMeta>;
}
