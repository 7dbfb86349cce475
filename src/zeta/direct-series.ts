import type { ComplexPoint, EvaluationResult } from '../types/index.ts';
import type { PrecisionController } from './precision.ts';

/**
 * Sum the Dirichlet series Σ n^(-s) directly. Only valid for Re(s) > 1; the
 * dispatcher routes nothing else here.
 *
 * After n terms the tail Σ_{m>n} |m^(-s)| = Σ m^(-σ) is bounded by
 * ∫_n^∞ x^(-σ) dx = n^(1-σ) / (σ - 1).
 */
export function sumDirect(s: ComplexPoint, precision: PrecisionController): EvaluationResult {
  const sigma = s.re;
  let re = 0;
  let im = 0;
  let tail = Infinity;
  let n = 0;

  while (precision.canContinue(n)) {
    n++;
    // n^(-s) = n^(-σ) * (cos(t ln n) - i sin(t ln n))
    const logN = Math.log(n);
    const r = Math.exp(-sigma * logN);
    if (s.im === 0) {
      re += r;
    } else {
      const theta = s.im * logN;
      re += r * Math.cos(theta);
      im -= r * Math.sin(theta);
    }

    tail = Math.exp((1 - sigma) * logN) / (sigma - 1);
    if (precision.isSatisfied(tail, { re, im }, n)) {
      return { value: { re, im }, errorEstimate: tail, terms: n, method: 'DIRECT', converged: true };
    }
  }

  return { value: { re, im }, errorEstimate: tail, terms: n, method: 'DIRECT', converged: false };
}
