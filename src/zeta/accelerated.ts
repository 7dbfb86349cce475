import type { ComplexPoint, EvaluationResult } from '../types/index.ts';
import { divide, magnitude, realPow, subtract, ONE } from '../math/complex.ts';
import type { PrecisionController } from './precision.ts';
import { sumEulerMaclaurin } from './euler-maclaurin.ts';

const BORWEIN_INITIAL_TERMS = 16;
// d_n grows like (3 + √8)^n; past ~400 it overflows a double.
const BORWEIN_MAX_TERMS = 320;

/** Below this |1 - 2^(1-s)| the eta relation loses too many digits. */
export const REMOVABLE_SINGULARITY_RADIUS = 0.05;
/** Borwein's error grows like e^(π|t|/2); past this use Euler–Maclaurin. */
export const BORWEIN_MAX_IMAG = 150;

/**
 * Borwein's accelerated Dirichlet eta:
 *   d_k = n Σ_{i=0..k} (n+i-1)! 4^i / ((n-i)! (2i)!)
 *   η(s) ≈ Σ_{k<n} (-1)^k (d_n - d_k)/d_n · (k+1)^(-s)
 */
export function borweinEta(s: ComplexPoint, n: number): ComplexPoint {
  const d = new Float64Array(n + 1);
  let term = 1;
  d[0] = 1;
  for (let i = 1; i <= n; i++) {
    term *= (4 * (n + i - 1) * (n - i + 1)) / ((2 * i - 1) * (2 * i));
    d[i] = d[i - 1] + term;
  }

  const dn = d[n];
  const negS = { re: -s.re, im: -s.im };
  let re = 0;
  let im = 0;
  for (let k = 0; k < n; k++) {
    const weight = (dn - d[k]) / dn;
    const w = k % 2 === 0 ? weight : -weight;
    const t = realPow(k + 1, negS);
    re += w * t.re;
    im += w * t.im;
  }
  return { re, im };
}

/**
 * ζ(s) = η(s) / (1 - 2^(1-s)) for 0 < Re(s) ≤ DIRECT_THRESHOLD, s ≠ 1.
 * Estimates at n and 2n terms are compared; their difference is the error
 * estimate. The passes together never spend more than maxTerms terms.
 */
export function sumAccelerated(s: ComplexPoint, precision: PrecisionController): EvaluationResult {
  const denom = subtract(ONE, realPow(2, subtract(ONE, s)));
  const denomMag = magnitude(denom);
  if (
    denomMag < REMOVABLE_SINGULARITY_RADIUS ||
    Math.abs(s.im) > BORWEIN_MAX_IMAG ||
    precision.minTerms > BORWEIN_MAX_TERMS
  ) {
    return sumEulerMaclaurin(s, precision);
  }

  let n = Math.min(BORWEIN_INITIAL_TERMS, precision.maxTerms);
  let eta = borweinEta(s, n);
  let terms = n;
  let value = divide(eta, denom);
  let errorEstimate = Infinity;

  for (;;) {
    const next = Math.min(n * 2, BORWEIN_MAX_TERMS, precision.maxTerms - terms);
    if (next <= n) break;
    const nextEta = borweinEta(s, next);
    terms += next;
    errorEstimate = magnitude(subtract(nextEta, eta)) / denomMag;
    eta = nextEta;
    n = next;
    value = divide(eta, denom);
    if (precision.isSatisfied(errorEstimate, value, terms)) {
      return { value, errorEstimate, terms, method: 'ACCELERATED', converged: true };
    }
  }

  return { value, errorEstimate, terms, method: 'ACCELERATED', converged: false };
}
