import { describe, it, expect } from 'vitest';
import { mapError } from '../../src/utils/error-mapper.js';
import { NotFoundError } from '../../src/core/errors.js';

describe('mapError', () => {
  it('should pass through application errors', () => {
    expect(mapError(new NotFoundError('flag', 3))).toEqual({
      message: 'flag not found: 3',
      code: 'E2000',
      details: { resource: 'flag', identifier: 3 },
    });
  });

  it('should map constraint failures', () => {
    expect(mapError(new Error('UNIQUE constraint failed: users.user_name')).code).toBe('E2002');
    expect(mapError(new Error('FOREIGN KEY constraint failed')).code).toBe('E2000');
  });

  it('should treat other errors as internal', () => {
    expect(mapError(new Error('boom'))).toEqual({ message: 'boom', code: 'E5001' });
  });

  it('should stringify non-errors', () => {
    expect(mapError('nope')).toEqual({ message: 'nope', code: 'E5000' });
  });
});
