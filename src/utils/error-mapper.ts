import { DataflagError, ErrorCodes } from '../core/errors.js';
import { createComponentLogger } from './logger.js';

const logger = createComponentLogger('error-mapper');

export interface MappedError {
  message: string;
  code: string;
  details?: Record<string, unknown>;
}

/**
 * Map any error to a standardized internal format
 */
export function mapError(error: unknown): MappedError {
  // 1. Handle known DataflagError
  if (error instanceof DataflagError) {
    return {
      message: error.message,
      code: error.code,
      details: error.context,
    };
  }

  // 2. Handle standard errors
  if (error instanceof Error) {
    const message = error.message;

    // Constraint failures that slipped past service-level checks
    if (message.includes('UNIQUE constraint failed')) {
      return { message, code: ErrorCodes.CONFLICT };
    }
    if (message.includes('FOREIGN KEY constraint failed')) {
      return { message, code: ErrorCodes.NOT_FOUND };
    }

    logger.warn({ error: message }, 'Unmapped internal error');
    return {
      message,
      code: ErrorCodes.INTERNAL_ERROR,
    };
  }

  // 3. Fallback
  logger.warn({ error: String(error) }, 'Unmapped unknown error');
  return {
    message: String(error),
    code: ErrorCodes.UNKNOWN_ERROR,
  };
}
