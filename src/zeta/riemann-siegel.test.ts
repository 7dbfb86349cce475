import { describe, it, expect } from 'vitest';
import { riemannSiegelTheta, riemannSiegelZ } from './riemann-siegel.ts';
import { evaluate } from './dispatcher.ts';
import { InvalidArgumentError } from './errors.ts';
import { exp, magnitude, multiply } from '../math/complex.ts';

const FIRST_ZERO = 14.134725141734693;

describe('riemannSiegelTheta', () => {
  it('vanishes at t = 0', () => {
    expect(riemannSiegelTheta(0)).toBe(0);
  });

  it('is odd', () => {
    expect(riemannSiegelTheta(-20)).toBeCloseTo(-riemannSiegelTheta(20), 12);
  });

  it('follows the asymptotic series for large t', () => {
    const t = 100;
    const expected =
      (t / 2) * Math.log(t / (2 * Math.PI)) - t / 2 - Math.PI / 8 + 1 / (48 * t) + 7 / (5760 * t ** 3);
    expect(riemannSiegelTheta(t)).toBeCloseTo(expected, 8);
  });

  it('rejects a non-finite height', () => {
    expect(() => riemannSiegelTheta(NaN)).toThrow(InvalidArgumentError);
  });
});

describe('riemannSiegelZ', () => {
  it('equals ζ(1/2) at t = 0', () => {
    expect(riemannSiegelZ(0)).toBeCloseTo(-1.4603545088095868, 11);
  });

  it('changes sign across the first zero', () => {
    expect(riemannSiegelZ(14)).toBeLessThan(0);
    expect(riemannSiegelZ(14.3)).toBeGreaterThan(0);
    expect(Math.abs(riemannSiegelZ(FIRST_ZERO))).toBeLessThan(1e-9);
  });

  it.each([7.5, 14, 25.3, 40])('rotates ζ(1/2 + it) onto the real axis at t = %s', t => {
    const zeta = evaluate({ re: 0.5, im: t }).value;
    const rotated = multiply(exp({ re: 0, im: riemannSiegelTheta(t) }), zeta);
    expect(Math.abs(rotated.im)).toBeLessThan(1e-9);
    expect(Math.abs(riemannSiegelZ(t))).toBeCloseTo(magnitude(zeta), 10);
  });
});
