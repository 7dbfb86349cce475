import { describe, it, expect } from 'vitest';
import {
  add, approxEqual, argument, conjugate, divide, exp, formatComplex, formatComplexLatex,
  log, magnitude, multiply, realPow, scale, sin, subtract,
} from './complex.ts';

describe('complex arithmetic', () => {
  it('adds, subtracts, multiplies and divides', () => {
    const a = { re: 1, im: 2 };
    const b = { re: 3, im: -1 };
    expect(add(a, b)).toEqual({ re: 4, im: 1 });
    expect(subtract(a, b)).toEqual({ re: -2, im: 3 });
    expect(multiply(a, b)).toEqual({ re: 5, im: 5 });
    expect(divide({ re: 5, im: 5 }, b)).toEqual({ re: 1, im: 2 });
  });

  it('scales, conjugates and measures', () => {
    expect(scale({ re: 1, im: -2 }, 3)).toEqual({ re: 3, im: -6 });
    expect(conjugate({ re: 1, im: 2 })).toEqual({ re: 1, im: -2 });
    expect(magnitude({ re: 3, im: 4 })).toBe(5);
  });

  it('keeps real powers of a real base exact', () => {
    expect(realPow(2, { re: 3, im: 0 })).toEqual({ re: 8, im: 0 });
    expect(realPow(2, { re: -1, im: 0 })).toEqual({ re: 0.5, im: 0 });
  });

  it('puts imaginary powers on the unit circle', () => {
    const z = realPow(2, { re: 0, im: 5 });
    expect(magnitude(z)).toBeCloseTo(1, 14);
    expect(argument(z)).toBeCloseTo(5 * Math.LN2 - 2 * Math.PI, 12);
  });

  it('exponentiates and takes principal logarithms', () => {
    expect(exp({ re: 0, im: 0 })).toEqual({ re: 1, im: 0 });
    expect(approxEqual(exp({ re: 0, im: Math.PI }), { re: -1, im: 0 }, 1e-15)).toBe(true);
    expect(log({ re: -1, im: 0 })).toEqual({ re: 0, im: Math.PI });
    expect(approxEqual(exp(log({ re: 3, im: -4 })), { re: 3, im: -4 }, 1e-14)).toBe(true);
  });

  it('compares componentwise within eps', () => {
    expect(approxEqual({ re: 1, im: 2 }, { re: 1 + 1e-11, im: 2 - 1e-11 })).toBe(true);
    expect(approxEqual({ re: 1, im: 2 }, { re: 1, im: 2.001 })).toBe(false);
    expect(approxEqual({ re: 1, im: 2 }, { re: 1, im: 2.001 }, 0.01)).toBe(true);
  });

  it('evaluates sin on and off the real axis', () => {
    expect(sin({ re: 0, im: 1 })).toEqual({ re: 0, im: Math.sinh(1) });
    expect(sin({ re: -Math.PI / 2, im: 0 })).toEqual({ re: -1, im: 0 });
  });
});

describe('formatComplex', () => {
  it('formats mixed values with a unicode minus', () => {
    expect(formatComplex({ re: 1.5, im: -2 })).toBe('1.5 − 2i');
    expect(formatComplex({ re: 0, im: 1 })).toBe('i');
    expect(formatComplex({ re: 0, im: -3 })).toBe('−3i');
  });

  it('rounds away tiny negative values without printing -0', () => {
    expect(formatComplex({ re: -1e-7, im: 0 })).toBe('0');
  });

  it('formats LaTeX with an ascii minus', () => {
    expect(formatComplexLatex({ re: 0.5, im: -14.134725 })).toBe('0.5 - 14.134725i');
    expect(formatComplexLatex({ re: 0, im: 0 })).toBe('0');
    expect(formatComplexLatex({ re: 0, im: -1 })).toBe('-i');
  });
});
