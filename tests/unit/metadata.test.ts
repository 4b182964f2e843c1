import { describe, it, expect } from 'vitest';
import { validateMetadata } from '../../src/utils/metadata.js';
import { freqMask, inputMask } from '../../src/utils/masks.js';
import { isDecision, isIndexList } from '../../src/utils/type-guards.js';
import { normalizeUserName } from '../../src/utils/names.js';

describe('validateMetadata', () => {
  it('should keep recognised and unknown keys', () => {
    expect(
      validateMetadata({ instrument: 'pathfinder', inputs: [0, 255], source: 'wiki' })
    ).toEqual({ instrument: 'pathfinder', inputs: [0, 255], source: 'wiki' });
  });

  it('should reject a non-object', () => {
    expect(() => validateMetadata([1, 2])).toThrow(
      'Validation error: metadata - must be a key-value mapping'
    );
  });

  it('should reject an unknown instrument', () => {
    expect(() => validateMetadata({ instrument: 'kelvin' })).toThrow(
      'Validation error: metadata.instrument - unknown instrument "kelvin". Suggestion: use one of chime, pathfinder'
    );
  });

  it('should reject frequency channels out of range', () => {
    expect(() => validateMetadata({ freq: [1024] })).toThrow(
      'Validation error: metadata.freq - index 1024 outside 0-1023'
    );
  });

  it('should reject non-integer index lists', () => {
    expect(() => validateMetadata({ freq: [1.5] })).toThrow(
      'Validation error: metadata.freq - must be a list of non-negative integers'
    );
    expect(() => validateMetadata({ inputs: [-1] })).toThrow(
      'Validation error: metadata.inputs - must be a list of non-negative integers'
    );
  });

  it('should only bound inputs when an instrument is given', () => {
    expect(validateMetadata({ inputs: [4000] })).toEqual({ inputs: [4000] });
  });

  it('should require string description and user', () => {
    expect(() => validateMetadata({ description: 3 })).toThrow(
      'Validation error: metadata.description - must be a string'
    );
    expect(() => validateMetadata({ user: false }, 'flag')).toThrow(
      'Validation error: flag.user - must be a string'
    );
  });
});

describe('masks', () => {
  it('should set only listed channels', () => {
    const mask = freqMask({ freq: [0, 1023] });
    expect(mask.filter(Boolean)).toHaveLength(2);
    expect(mask[0]).toBe(true);
    expect(mask[1023]).toBe(true);
  });

  it('should cover everything without a freq list', () => {
    expect(freqMask(null).every(Boolean)).toBe(true);
  });

  it('should size the input mask by instrument', () => {
    const mask = inputMask({ instrument: 'pathfinder', inputs: [2] });
    expect(mask).toHaveLength(256);
    expect(mask?.indexOf(true)).toBe(2);
    expect(inputMask({ inputs: [2] })).toBeNull();
  });
});

describe('type guards', () => {
  it('should recognise decisions', () => {
    expect(isDecision('bad')).toBe(true);
    expect(isDecision('Bad')).toBe(false);
  });

  it('should recognise index lists', () => {
    expect(isIndexList([])).toBe(true);
    expect(isIndexList([0, 3])).toBe(true);
    expect(isIndexList(['0'])).toBe(false);
  });
});

describe('normalizeUserName', () => {
  it('should trim and capitalise the first letter', () => {
    expect(normalizeUserName('  alice ')).toBe('Alice');
    expect(normalizeUserName('Bob')).toBe('Bob');
  });
});
