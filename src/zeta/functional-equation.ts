import type { ComplexPoint, EvaluateOptions, ToleranceConfig } from '../types/index.ts';
import { magnitude, multiply, subtract, ONE } from '../math/complex.ts';
import { resolveLogGamma } from '../math/gamma.ts';
import { evaluate } from './dispatcher.ts';
import { functionalEquationFactor } from './reflection.ts';

const ZETA_AT_ZERO: ComplexPoint = Object.freeze({ re: -0.5, im: 0 });

export interface FunctionalEquationCheck {
  valid: boolean;
  direct: ComplexPoint;
  functional: ComplexPoint;
  error: number;
}

/**
 * Compare ζ(s) from the engine with χ(s) ζ(1-s) built from a second
 * engine call. Both sides use the same tolerance settings. At s = 0 the
 * right-hand side would need ζ(1); its limit -1/2 is used instead.
 */
export function validateFunctionalEquation(
  s: ComplexPoint,
  threshold = 1e-10,
  tolerance?: Partial<ToleranceConfig>,
  options: EvaluateOptions = {},
): FunctionalEquationCheck {
  const direct = evaluate(s, tolerance, options).value;
  const functional = s.re === 0 && s.im === 0
    ? ZETA_AT_ZERO
    : multiply(
      functionalEquationFactor(s, resolveLogGamma(options)),
      evaluate(subtract(ONE, s), tolerance, options).value,
    );
  const error = magnitude(subtract(direct, functional));
  return { valid: error < threshold, direct, functional, error };
}
