import { describe, it, expect } from 'vitest';
import { classify, DIRECT_THRESHOLD } from './validator.ts';
import { InvalidArgumentError, PoleError } from './errors.ts';

describe('classify', () => {
  it('routes by real part', () => {
    expect(classify({ re: 4.5, im: 3 })).toBe('DIRECT');
    expect(classify({ re: DIRECT_THRESHOLD, im: 0 })).toBe('ACCELERATED');
    expect(classify({ re: 2, im: 0 })).toBe('ACCELERATED');
    expect(classify({ re: 1e-9, im: -7 })).toBe('ACCELERATED');
    expect(classify({ re: 0, im: 5 })).toBe('REFLECTED');
    expect(classify({ re: -3, im: 0 })).toBe('REFLECTED');
  });

  it('rejects the pole exactly and nothing near it', () => {
    expect(() => classify({ re: 1, im: 0 })).toThrow(PoleError);
    expect(() => classify({ re: 1, im: -0 })).toThrow(PoleError);
    expect(classify({ re: 1, im: 1e-300 })).toBe('ACCELERATED');
    expect(classify({ re: 1 + Number.EPSILON, im: 0 })).toBe('ACCELERATED');
  });

  it('rejects non-finite components', () => {
    expect(() => classify({ re: NaN, im: 0 })).toThrow(InvalidArgumentError);
    expect(() => classify({ re: 0, im: Infinity })).toThrow(InvalidArgumentError);
    expect(() => classify({ re: -Infinity, im: 0 })).toThrow(InvalidArgumentError);
  });

  it('rejects values that are not complex points', () => {
    expect(() => classify(null)).toThrow(InvalidArgumentError);
    expect(() => classify(2)).toThrow(InvalidArgumentError);
    expect(() => classify({ re: '1', im: 0 })).toThrow(InvalidArgumentError);
    expect(() => classify({ re: 1 })).toThrow(InvalidArgumentError);
  });

  it('keeps the offending value on the error', () => {
    const bad = { re: NaN, im: 0 };
    try {
      classify(bad);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidArgumentError);
      expect(err instanceof InvalidArgumentError && err.value).toBe(bad);
      expect(err instanceof Error && err.name).toBe('InvalidArgumentError');
    }
  });
});
