import type { AppDb } from '../../core/types.js';

/**
 * Database type alias for explicit DI in repository methods
 */
export type DrizzleDb = AppDb;

/**
 * Whether a driver error is a UNIQUE / PRIMARY KEY constraint violation
 */
export function isUniqueConstraintError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = 'code' in error ? String(error.code) : '';
  return (
    code === 'SQLITE_CONSTRAINT_UNIQUE' ||
    code === 'SQLITE_CONSTRAINT_PRIMARYKEY' ||
    error.message.includes('UNIQUE constraint failed')
  );
}
