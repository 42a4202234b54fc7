import { describe, it, expect } from 'vitest';
import { attempt, resultify } from '../../../src/utils/result-helpers.js';

describe('resultify', () => {
  it('should wrap a resolved value in Ok', async () => {
    const result = await resultify(Promise.resolve(42));
    expect(result.ok).toBe(true);
    expect(result.val).toBe(42);
  });

  it('should wrap a rejection in Err', async () => {
    const result = await resultify(Promise.reject(new Error('connection refused')));
    expect(result.err).toBe(true);
    expect(result.val).toBeInstanceOf(Error);
    if (result.err) {
      expect(result.val.message).toBe('connection refused');
    }
  });

  it('should wrap non-Error rejections', async () => {
    const result = await resultify(Promise.reject('boom'));
    expect(result.err).toBe(true);
    if (result.err) {
      expect(result.val.message).toBe('boom');
    }
  });
});

describe('attempt', () => {
  it('should capture synchronous throws', () => {
    const result = attempt((): unknown => JSON.parse('{not json'));
    expect(result.err).toBe(true);
  });

  it('should return Ok for a value', () => {
    const result = attempt((): unknown => JSON.parse('{"a":1}'));
    expect(result.ok).toBe(true);
    expect(result.val).toEqual({ a: 1 });
  });
});
