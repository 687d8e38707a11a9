import { describe, it, expect } from '@jest/globals';
import {
  ValidationError,
  validatePositiveInt,
  validatePositiveNumber,
  validateProbability,
  validateRange,
  validateSeed,
} from '@/lib/validation';

function fieldOf(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (e) {
    return e instanceof ValidationError ? e.field : 'not-a-validation-error';
  }
}

describe('Validation Module', () => {
  describe('validatePositiveInt', () => {
    it('should accept positive integers and numeric strings', () => {
      expect(validatePositiveInt('n', 3)).toBe(3);
      expect(validatePositiveInt('n', '42')).toBe(42);
    });

    it('should reject zero, negatives, fractions and garbage', () => {
      expect(fieldOf(() => validatePositiveInt('users', 0))).toBe('users');
      expect(fieldOf(() => validatePositiveInt('users', -4))).toBe('users');
      expect(fieldOf(() => validatePositiveInt('users', 1.5))).toBe('users');
      expect(fieldOf(() => validatePositiveInt('users', 'abc'))).toBe('users');
      expect(fieldOf(() => validatePositiveInt('users', undefined))).toBe('users');
    });

    it('should enforce the upper bound', () => {
      expect(validatePositiveInt('n', 10, 10)).toBe(10);
      expect(() => validatePositiveInt('n', 11, 10)).toThrow('n must be at most 10');
    });
  });

  describe('validateProbability', () => {
    it('should accept the closed unit interval', () => {
      expect(validateProbability('p', 0)).toBe(0);
      expect(validateProbability('p', 1)).toBe(1);
      expect(validateProbability('p', 0.25)).toBe(0.25);
    });

    it('should reject values outside it', () => {
      expect(fieldOf(() => validateProbability('upvoteRate', 1.1))).toBe('upvoteRate');
      expect(fieldOf(() => validateProbability('upvoteRate', -0.1))).toBe('upvoteRate');
      expect(fieldOf(() => validateProbability('upvoteRate', Number.NaN))).toBe('upvoteRate');
    });
  });

  describe('validatePositiveNumber', () => {
    it('should accept finite positive numbers only', () => {
      expect(validatePositiveNumber('skew', 1.2)).toBe(1.2);
      expect(fieldOf(() => validatePositiveNumber('skew', 0))).toBe('skew');
      expect(fieldOf(() => validatePositiveNumber('skew', Number.POSITIVE_INFINITY))).toBe('skew');
    });
  });

  describe('validateRange', () => {
    it('should accept min <= max', () => {
      expect(validateRange('posts', { min: 1, max: 3 })).toEqual({ min: 1, max: 3 });
      expect(validateRange('posts', { min: 2, max: 2 })).toEqual({ min: 2, max: 2 });
    });

    it('should reject an inverted range', () => {
      expect(() => validateRange('posts', { min: 4, max: 1 })).toThrow('posts.min must not exceed posts.max');
    });

    it('should report the bound that is invalid', () => {
      expect(fieldOf(() => validateRange('posts', { min: 0, max: 1 }))).toBe('posts.min');
    });
  });

  describe('validateSeed', () => {
    it('should normalize integers to unsigned 32-bit', () => {
      expect(validateSeed(7)).toBe(7);
      expect(validateSeed(-1)).toBe(4294967295);
    });

    it('should reject non-integers', () => {
      expect(() => validateSeed(1.5)).toThrow(ValidationError);
      expect(() => validateSeed('12')).toThrow(ValidationError);
    });
  });
});
