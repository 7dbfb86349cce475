import type { ComplexPoint, EvaluationResult } from '../types/index.ts';
import { add, divide, magnitude, multiply, realPow, scale, subtract, ONE } from '../math/complex.ts';
import type { PrecisionController } from './precision.ts';

/** Number of Bernoulli correction terms. */
export const EULER_MACLAURIN_ORDER = 12;

// B2, B4, ..., B26: one more than the order, for the truncation bound.
const BERNOULLI_EVEN = [
  1 / 6, -1 / 30, 1 / 42, -1 / 30, 5 / 66, -691 / 2730, 7 / 6,
  -3617 / 510, 43867 / 798, -174611 / 330, 854513 / 138,
  -236364091 / 2730, 8553103 / 6,
];

function factorial(n: number): number {
  let f = 1;
  for (let i = 2; i <= n; i++) f *= i;
  return f;
}

/** B_2k / (2k)! */
const CORRECTION_COEFFS = BERNOULLI_EVEN.map((b, i) => b / factorial(2 * (i + 1)));

interface PartialEvaluation {
  value: ComplexPoint;
  errorEstimate: number;
}

/**
 * ζ(s) ≈ Σ_{n<N} n^(-s) + N^(1-s)/(s-1) + N^(-s)/2
 *        + Σ_{k=1..M} B_2k/(2k)! · s(s+1)…(s+2k-2) · N^(-s-2k+1)
 *
 * The remainder is bounded by the first omitted term times |s+2M+1| / (σ+2M+1).
 */
export function eulerMaclaurinAt(s: ComplexPoint, n: number, order = EULER_MACLAURIN_ORDER): PartialEvaluation {
  const negS = { re: -s.re, im: -s.im };
  let sum: ComplexPoint = { re: 0, im: 0 };
  for (let k = 1; k < n; k++) {
    sum = add(sum, realPow(k, negS));
  }

  const nPow = realPow(n, subtract(ONE, s)); // N^(1-s)
  sum = add(sum, divide(nPow, subtract(s, ONE)));
  sum = add(sum, scale(nPow, 0.5 / n));

  const invN2 = 1 / (n * n);
  let rising = s;
  let power = scale(nPow, invN2);
  for (let k = 1; k <= order; k++) {
    sum = add(sum, scale(multiply(rising, power), CORRECTION_COEFFS[k - 1]));
    rising = multiply(rising, multiply(
      { re: s.re + 2 * k - 1, im: s.im },
      { re: s.re + 2 * k, im: s.im },
    ));
    power = scale(power, invN2);
  }

  const omitted = Math.abs(CORRECTION_COEFFS[order]) * magnitude(multiply(rising, power));
  const tailFactor = magnitude({ re: s.re + 2 * order + 1, im: s.im }) / (s.re + 2 * order + 1);
  return { value: sum, errorEstimate: omitted * tailFactor };
}

/**
 * Euler–Maclaurin evaluation for Re(s) > 0, s ≠ 1. Used where the eta
 * relation divides by a vanishing 1 - 2^(1-s), and for large |Im(s)|.
 * N doubles until the remainder bound meets the target; the last pass
 * shrinks to whatever the term budget has left.
 */
export function sumEulerMaclaurin(s: ComplexPoint, precision: PrecisionController): EvaluationResult {
  const start = Math.ceil(magnitude(s) / (2 * Math.PI)) + 10;
  let n = Math.min(precision.maxTerms, Math.max(precision.minTerms, start));
  let terms = 0;

  for (;;) {
    const { value, errorEstimate } = eulerMaclaurinAt(s, n);
    terms += n;
    if (precision.isSatisfied(errorEstimate, value, terms)) {
      return { value, errorEstimate, terms, method: 'ACCELERATED', converged: true };
    }
    const next = Math.min(n * 2, precision.maxTerms - terms);
    if (next <= n) {
      return { value, errorEstimate, terms, method: 'ACCELERATED', converged: false };
    }
    n = next;
  }
}
