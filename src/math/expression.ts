import { parse, isComplex } from 'mathjs';
import type { ComplexPoint, ParseResult } from '../types/index.ts';

/**
 * Parse an expression that evaluates to a single complex number.
 * Accepts: 2, -3, 1/2 + 14.134725i, pi, 2i, 1-i, sqrt(2)/2 + i, 3 + 4*i
 */
export function parseComplexExpression(input: string): ParseResult {
  const trimmed = input.trim();
  if (!trimmed) {
    return { ok: false, error: '' }; // empty input, silent
  }

  let value: unknown;
  try {
    // `2i` -> `2*(1i)`, standalone `i` -> `(1i)`
    const processed = trimmed
      .replace(/(\d)i(?![a-zA-Z])/g, '$1*(1i)')
      .replace(/(?<![a-zA-Z0-9])i(?![a-zA-Z0-9])/g, '(1i)');
    value = parse(processed).evaluate();
  } catch {
    return { ok: false, error: `Invalid expression: ${trimmed}` };
  }

  let result: ComplexPoint;
  if (typeof value === 'number') {
    result = { re: value, im: 0 };
  } else if (isComplex(value)) {
    result = { re: value.re, im: value.im };
  } else {
    return { ok: false, error: `Expression is not a number: ${trimmed}` };
  }

  if (!Number.isFinite(result.re) || !Number.isFinite(result.im)) {
    return { ok: false, error: 'Result is not finite' };
  }
  // Normalise -0 so "-0" never shows up downstream
  return { ok: true, value: { re: result.re + 0, im: result.im + 0 } };
}
