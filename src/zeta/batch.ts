import type { ComplexPoint, EvaluateOptions, EvaluationResult, ToleranceConfig } from '../types/index.ts';
import { evaluate } from './dispatcher.ts';
import { InvalidArgumentError, PoleError } from './errors.ts';
import { assertComplexPoint } from './validator.ts';

export type Sample =
  | { s: ComplexPoint; result: EvaluationResult }
  | { s: ComplexPoint; error: 'pole' };

/**
 * Walk from `start`, adding `step` to both the real and imaginary part,
 * while neither part has passed `end`. Each point is evaluated on its own.
 */
export function sampleSegment(
  start: ComplexPoint,
  end: ComplexPoint,
  step: number,
  tolerance?: Partial<ToleranceConfig>,
  options: EvaluateOptions = {},
): Sample[] {
  assertComplexPoint(start);
  assertComplexPoint(end);
  if (!Number.isFinite(step) || step <= 0) {
    throw new InvalidArgumentError(`step must be a positive finite number, got ${step}`, step);
  }

  const samples: Sample[] = [];
  // Index-based so the walk does not accumulate rounding error.
  for (let i = 0; ; i++) {
    const s = { re: start.re + i * step, im: start.im + i * step };
    if (s.re > end.re || s.im > end.im) break;
    try {
      samples.push({ s, result: evaluate(s, tolerance, options) });
    } catch (err) {
      if (!(err instanceof PoleError)) throw err;
      samples.push({ s, error: 'pole' });
    }
  }
  return samples;
}
