import type { ComplexPoint, Region } from '../types/index.ts';
import { InvalidArgumentError, PoleError } from './errors.ts';

/** Above this real part the plain Dirichlet series is summed directly. */
export const DIRECT_THRESHOLD = 4;

export function assertComplexPoint(s: unknown): asserts s is ComplexPoint {
  if (typeof s !== 'object' || s === null) {
    throw new InvalidArgumentError('Argument must be a complex number { re, im }', s);
  }
  if (!('re' in s) || !('im' in s)) {
    throw new InvalidArgumentError('Argument must be a complex number { re, im }', s);
  }
  const { re, im } = s;
  if (typeof re !== 'number' || typeof im !== 'number') {
    throw new InvalidArgumentError('Argument components must be numbers', s);
  }
  if (!Number.isFinite(re) || !Number.isFinite(im)) {
    throw new InvalidArgumentError(`Argument components must be finite, got (${re}, ${im})`, s);
  }
}

/**
 * Decide which strategy evaluates ζ at `s`. The pole check is exact; the
 * region boundaries compare the real part against fixed thresholds.
 */
export function classify(s: unknown): Exclude<Region, 'POLE'> {
  assertComplexPoint(s);
  if (s.re === 1 && s.im === 0) throw new PoleError(s);
  if (s.re > DIRECT_THRESHOLD) return 'DIRECT';
  if (s.re > 0) return 'ACCELERATED';
  return 'REFLECTED';
}
