import { describe, it, expect } from 'vitest';
import { parseComplexExpression } from './expression.ts';

describe('parseComplexExpression', () => {
  it('parses real numbers', () => {
    expect(parseComplexExpression('2')).toEqual({ ok: true, value: { re: 2, im: 0 } });
    expect(parseComplexExpression(' -3 ')).toEqual({ ok: true, value: { re: -3, im: 0 } });
  });

  it('parses complex literals with a trailing i', () => {
    expect(parseComplexExpression('0.5 + 14.134725i')).toEqual({
      ok: true,
      value: { re: 0.5, im: 14.134725 },
    });
    expect(parseComplexExpression('i')).toEqual({ ok: true, value: { re: 0, im: 1 } });
  });

  it('evaluates constants', () => {
    const result = parseComplexExpression('pi');
    expect(result.ok && result.value.re).toBe(Math.PI);
  });

  it('is silent on empty input', () => {
    expect(parseComplexExpression('   ')).toEqual({ ok: false, error: '' });
  });

  it('rejects unknown symbols', () => {
    expect(parseComplexExpression('foo')).toEqual({ ok: false, error: 'Invalid expression: foo' });
  });

  it('rejects non-finite and non-scalar results', () => {
    expect(parseComplexExpression('1/0')).toEqual({ ok: false, error: 'Result is not finite' });
    expect(parseComplexExpression('[1, 2]')).toEqual({ ok: false, error: 'Expression is not a number: [1, 2]' });
  });
});
