import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { SafetyError, toSafetyError, zodErrorToSafetyError } from '../../../src/api/errors.js';

describe('SafetyError', () => {
  it('serializes to a plain object', () => {
    const error = new SafetyError('RegistrationError', 'Cache rejected', { cache: 'sessions' });

    expect(error.name).toBe('SafetyError');
    expect(error.toObject()).toEqual({
      code: 'RegistrationError',
      message: 'Cache rejected',
      details: { cache: 'sessions' },
    });
  });
});

describe('toSafetyError', () => {
  it('returns a SafetyError unchanged', () => {
    const original = new SafetyError('ConfigurationError', 'Bad threshold');

    expect(toSafetyError(original, 'AnalysisError')).toBe(original);
  });

  it('wraps an Error with the fallback code', () => {
    const error = toSafetyError(new TypeError('Cannot read properties of undefined'), 'AnalysisError');

    expect(error.code).toBe('AnalysisError');
    expect(error.message).toBe('Cannot read properties of undefined');
    expect(error.details).toEqual({ cause: 'TypeError' });
  });

  it('wraps a thrown value that is not an Error', () => {
    const error = toSafetyError('disk unplugged');

    expect(error.code).toBe('UnknownError');
    expect(error.message).toBe('Unknown error: disk unplugged');
  });
});

describe('zodErrorToSafetyError', () => {
  it('lists every issue with its path', () => {
    const result = z.object({ limit: z.number().positive('must be positive') }).safeParse({ limit: -1 });
    if (result.success) {
      expect.unreachable('schema should reject a negative limit');
      return;
    }

    const error = zodErrorToSafetyError(result.error, 'ConfigurationError', 'Invalid cache options');

    expect(error.code).toBe('ConfigurationError');
    expect(error.message).toBe('Invalid cache options: limit must be positive');
  });
});
