import type { ComplexPoint, EvaluationResult, LogGammaFunction } from '../types/index.ts';
import { add, exp, isFinitePoint, log, magnitude, multiply, scale, sin, subtract, ONE } from '../math/complex.ts';

/** Evaluates ζ at the reflected point; the dispatcher passes itself in. */
export type ReflectedEvaluator = (z: ComplexPoint) => EvaluationResult;

export function isNegativeEvenInteger(s: ComplexPoint): boolean {
  return s.im === 0 && s.re < 0 && s.re % 2 === 0;
}

/**
 * log sin(z). Past |Im z| = 1 it is built from the dominant exponential,
 *   sin z = (i/2) e^(-iz) (1 - e^(2iz))     for Im z > 0
 *   sin z = (-i/2) e^(iz) (1 - e^(-2iz))    for Im z < 0
 * so it stays finite where sin z overflows.
 */
export function logSin(z: ComplexPoint): ComplexPoint {
  if (Math.abs(z.im) <= 1) return log(sin(z));
  if (z.im > 0) {
    const tail = log(subtract(ONE, exp({ re: -2 * z.im, im: 2 * z.re })));
    return { re: z.im - Math.LN2 + tail.re, im: Math.PI / 2 - z.re + tail.im };
  }
  const tail = log(subtract(ONE, exp({ re: 2 * z.im, im: -2 * z.re })));
  return { re: -z.im - Math.LN2 + tail.re, im: z.re - Math.PI / 2 + tail.im };
}

/** log χ(s) = s ln 2 + (s-1) ln π + log sin(πs/2) + log Γ(1-s), up to multiples of 2πi. */
export function logFunctionalEquationFactor(s: ComplexPoint, logGamma: LogGammaFunction): ComplexPoint {
  const powers = add(scale(s, Math.LN2), scale(subtract(s, ONE), Math.log(Math.PI)));
  return add(powers, add(logSin(scale(s, Math.PI / 2)), logGamma(subtract(ONE, s))));
}

/**
 * χ(s) = 2^s · π^(s-1) · sin(πs/2) · Γ(1-s), so that ζ(s) = χ(s) ζ(1-s).
 * Summed in log space and exponentiated once; the factors alone overflow
 * long before χ does.
 */
export function functionalEquationFactor(s: ComplexPoint, logGamma: LogGammaFunction): ComplexPoint {
  if (s.im === 0) {
    // Real axis: carry the sign of the sine separately so the result stays real.
    const sine = Math.sin((s.re * Math.PI) / 2);
    const lg = logGamma({ re: 1 - s.re, im: 0 });
    const logMagnitude =
      s.re * Math.LN2 + (s.re - 1) * Math.log(Math.PI) + Math.log(Math.abs(sine)) + lg.re;
    return { re: Math.sign(sine) * Math.cos(lg.im) * Math.exp(logMagnitude), im: 0 };
  }
  return exp(logFunctionalEquationFactor(s, logGamma));
}

/**
 * ζ(s) for Re(s) ≤ 0 through the functional equation. 1 - s has real part
 * ≥ 1 so `evaluateReflected` never reflects again.
 */
export function reflect(
  s: ComplexPoint,
  logGamma: LogGammaFunction,
  evaluateReflected: ReflectedEvaluator,
): EvaluationResult {
  // 1 - s would be the pole; ζ(0) = -1/2 is the limit.
  if (s.re === 0 && s.im === 0) {
    return { value: { re: -0.5, im: 0 }, errorEstimate: 0, terms: 0, method: 'REFLECTED', converged: true };
  }
  // Trivial zeros: sin(πs/2) vanishes exactly.
  if (isNegativeEvenInteger(s)) {
    return { value: { re: 0, im: 0 }, errorEstimate: 0, terms: 0, method: 'REFLECTED', converged: true };
  }

  const inner = evaluateReflected(subtract(ONE, s));
  const factor = functionalEquationFactor(s, logGamma);
  const value = multiply(factor, inner.value);

  if (!isFinitePoint(value)) {
    return { value, errorEstimate: Infinity, terms: inner.terms, method: 'REFLECTED', converged: false };
  }

  return {
    value,
    errorEstimate: magnitude(factor) * inner.errorEstimate,
    terms: inner.terms,
    method: 'REFLECTED',
    converged: inner.converged,
  };
}
