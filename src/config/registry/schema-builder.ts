/**
 * Zod Schema Builder
 *
 * Builds Zod validation schemas and config values from the config registry.
 */

import { z } from 'zod';
import type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta, ParserType } from './types.js';
import { parseBoolean, parseChoice, parseNumber, resolveDataPath } from './parsers.js';
import { createValidationError } from '../../core/errors.js';

// =============================================================================
// SCHEMA BUILDING
// =============================================================================

/**
 * Build a Zod object schema for a single section
 */
export function buildSectionSchema(section: ConfigSectionMeta): z.ZodObject<Record<string, z.ZodType>> {
  const shape: Record<string, z.ZodType> = {};

  for (const [key, option] of Object.entries(section.options)) {
    shape[key] = option.schema;
  }

  return z.object(shape);
}

/**
 * Build a complete Zod schema from the config registry
 */
export function buildConfigSchema(registry: ConfigRegistry): z.ZodObject<Record<string, z.ZodType>> {
  const shape: Record<string, z.ZodType> = {};

  for (const [key, section] of Object.entries(registry.sections)) {
    shape[key] = buildSectionSchema(section);
  }

  return z.object(shape);
}

/**
 * Format Zod validation errors into human-readable messages
 */
export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.map(String).join('.');
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate a config object against the registry schema.
 * Throws with all issues listed, or returns the parsed value.
 */
export function validateConfig<T>(config: unknown, schema: z.ZodType<T>): T {
  const result = schema.safeParse(config);

  if (!result.success) {
    const errors = formatZodErrors(result.error);
    throw createValidationError(
      'config',
      `Configuration validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`
    );
  }

  return result.data;
}

/**
 * List every environment variable the registry reads
 */
export interface EnvVarInfo {
  envKey: string;
  description: string;
  defaultValue: unknown;
  section: string;
}

export function getAllEnvVars(registry: ConfigRegistry): EnvVarInfo[] {
  const envVars: EnvVarInfo[] = [];

  for (const [sectionKey, section] of Object.entries(registry.sections)) {
    for (const option of Object.values(section.options)) {
      if (!option.envKey) continue;
      envVars.push({
        envKey: option.envKey,
        description: option.description,
        defaultValue: option.defaultValue,
        section: sectionKey,
      });
    }
  }

  return envVars;
}

// =============================================================================
// CONFIG BUILDING FROM REGISTRY
// =============================================================================

/**
 * Infer parser type from the default value when not explicitly specified
 */
function inferParser(option: ConfigOptionMeta): ParserType {
  switch (typeof option.defaultValue) {
    case 'boolean':
      return 'boolean';
    case 'number':
      return 'number';
    default:
      return 'string';
  }
}

/**
 * Parse an environment variable value using the option's parser
 */
function parseEnvValue(option: ConfigOptionMeta, envValue: string | undefined): unknown {
  const defaultValue = option.defaultValue;

  if (typeof option.parse === 'function') {
    return option.parse(envValue, defaultValue);
  }

  const parserType: ParserType = option.parse ?? inferParser(option);

  // Path defaults are relative to the data dir and must be resolved too
  if (parserType === 'path') {
    return resolveDataPath(envValue, String(defaultValue));
  }

  if (envValue === undefined || envValue === '') {
    return defaultValue;
  }

  switch (parserType) {
    case 'boolean':
      return parseBoolean(envValue, Boolean(defaultValue));
    case 'number':
      return parseNumber(envValue, Number(defaultValue));
    case 'int':
      return parseNumber(envValue, Number(defaultValue), true);
    case 'string':
      return option.allowedValues
        ? parseChoice(envValue, String(defaultValue), option.allowedValues)
        : envValue;
  }
}

/**
 * Build complete config from registry metadata.
 * This is the single source of truth - no manual env var reading elsewhere.
 */
export function buildConfigFromRegistry(registry: ConfigRegistry): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, section] of Object.entries(registry.sections)) {
    const values: Record<string, unknown> = {};
    for (const [optionKey, option] of Object.entries(section.options)) {
      values[optionKey] = parseEnvValue(option, option.envKey ? process.env[option.envKey] : undefined);
    }
    result[key] = values;
  }

  return result;
}
