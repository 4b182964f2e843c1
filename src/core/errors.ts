/**
 * Core error definitions - transport-agnostic
 *
 * Error classes, codes and factory functions used by every layer
 * (db, services, voting engine, cli).
 */

export class DataflagError extends Error {
  constructor(
    message: string,
    public code: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DataflagError';
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error codes for programmatic handling
 */
export const ErrorCodes = {
  // Validation errors (1000-1999)
  MISSING_REQUIRED_FIELD: 'E1000',
  INVALID_DECISION: 'E1001',
  INVALID_METADATA: 'E1002',
  INVALID_TIME_RANGE: 'E1003',
  INVALID_PARAMETER: 'E1004',
  SIZE_LIMIT_EXCEEDED: 'E1005',
  IMMUTABLE_FIELD: 'E1006',

  // Resource errors (2000-2999)
  NOT_FOUND: 'E2000',
  CONFLICT: 'E2002',

  // Voting configuration errors (3000-3999)
  UNKNOWN_MODE: 'E3000',
  INVALID_CONFIGURATION: 'E3001',

  // Database errors (4000-4999)
  DATABASE_ERROR: 'E4000',
  MIGRATION_ERROR: 'E4001',
  TRANSACTION_ERROR: 'E4004',

  // System errors (5000-5999)
  UNKNOWN_ERROR: 'E5000',
  INTERNAL_ERROR: 'E5001',
} as const;

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * Invalid input, rejected before any write
 */
export class ValidationError extends DataflagError {
  constructor(
    public readonly field: string,
    message: string,
    code: string = ErrorCodes.INVALID_PARAMETER,
    context?: Record<string, unknown>
  ) {
    super(`Validation error: ${field} - ${message}`, code, { ...context, field });
    this.name = 'ValidationError';
  }
}

/**
 * A referenced revision, type, user, opinion or flag does not exist
 */
export class NotFoundError extends DataflagError {
  constructor(
    public readonly resource: string,
    public readonly identifier?: string | number,
    context?: Record<string, unknown>
  ) {
    super(
      identifier !== undefined
        ? `${resource} not found: ${String(identifier)}`
        : `${resource} not found`,
      ErrorCodes.NOT_FOUND,
      { ...context, resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

/**
 * Uniqueness violation (duplicate name, duplicate opinion key)
 */
export class ConflictError extends DataflagError {
  constructor(
    public readonly resource: string,
    details: string,
    context?: Record<string, unknown>
  ) {
    super(`Conflict detected: ${resource} - ${details}`, ErrorCodes.CONFLICT, {
      ...context,
      resource,
    });
    this.name = 'ConflictError';
  }
}

/**
 * Voting mode not present in the strategy registry
 */
export class UnknownModeError extends DataflagError {
  constructor(
    public readonly mode: string,
    public readonly choices: readonly string[]
  ) {
    super(
      `Invalid value for 'mode': "${mode}" (choose one of ${choices.join(', ')})`,
      ErrorCodes.UNKNOWN_MODE,
      { mode, choices: [...choices] }
    );
    this.name = 'UnknownModeError';
  }
}

/**
 * Configuration-time invariant broken (e.g. mode name longer than the vote column)
 */
export class InvalidConfigurationError extends DataflagError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCodes.INVALID_CONFIGURATION, context);
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * Database-specific errors
 */
export class DatabaseError extends DataflagError {
  constructor(
    message: string,
    code: string = ErrorCodes.DATABASE_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = 'DatabaseError';
  }
}

/**
 * A transaction failed and was rolled back
 */
export class PersistenceError extends DatabaseError {
  constructor(
    public readonly operation: string,
    cause: unknown,
    context?: Record<string, unknown>
  ) {
    const causeMessage = cause instanceof Error ? cause.message : String(cause);
    super(`Transaction failed during ${operation}: ${causeMessage}`, ErrorCodes.TRANSACTION_ERROR, {
      ...context,
      operation,
    });
    this.name = 'PersistenceError';
    this.cause = cause;
  }
}

// =============================================================================
// FACTORY FUNCTIONS
// =============================================================================

/**
 * Create a validation error with helpful context
 */
export function createValidationError(
  field: string,
  message: string,
  suggestion?: string,
  code: string = ErrorCodes.INVALID_PARAMETER
): ValidationError {
  return new ValidationError(
    field,
    `${message}${suggestion ? `. Suggestion: ${suggestion}` : ''}`,
    code,
    suggestion ? { suggestion } : undefined
  );
}

/**
 * Create a not found error with resource details
 */
export function createNotFoundError(resource: string, identifier?: string | number): NotFoundError {
  return new NotFoundError(resource, identifier, {
    suggestion: `Check that the ${resource} exists and you have the correct identifier`,
  });
}

/**
 * Create a conflict error
 */
export function createConflictError(resource: string, details: string): ConflictError {
  return new ConflictError(resource, details);
}

/**
 * Create a size limit exceeded error
 */
export function createSizeLimitError(
  field: string,
  maxSize: number,
  actualSize: number,
  unit: string = 'characters'
): ValidationError {
  return new ValidationError(
    field,
    `exceeds maximum ${unit} of ${maxSize} (got ${actualSize})`,
    ErrorCodes.SIZE_LIMIT_EXCEEDED,
    { maxSize, actualSize, unit }
  );
}
