import type { EvaluateOptions, LogGammaFunction, ToleranceConfig } from '../types/index.ts';
import { exp, multiply } from '../math/complex.ts';
import { mathjsLogGamma, resolveLogGamma } from '../math/gamma.ts';
import { evaluate } from './dispatcher.ts';
import { InvalidArgumentError } from './errors.ts';

function assertFiniteHeight(t: number): void {
  if (!Number.isFinite(t)) {
    throw new InvalidArgumentError(`t must be a finite number, got ${String(t)}`, t);
  }
}

/**
 * θ(t) = Im log Γ(1/4 + it/2) - (t/2) ln π.
 *
 * Needs the continuous branch of log Γ, which mathjs provides. An injected
 * log-gamma on the principal branch gives θ only modulo 2π.
 */
export function riemannSiegelTheta(t: number, logGamma: LogGammaFunction = mathjsLogGamma): number {
  assertFiniteHeight(t);
  return logGamma({ re: 0.25, im: t / 2 }).im - (t / 2) * Math.log(Math.PI);
}

/**
 * Hardy's Z(t) = e^(iθ(t)) ζ(1/2 + it). Real for real t, with |Z(t)| = |ζ(1/2 + it)|,
 * so its sign changes mark zeros on the critical line.
 */
export function riemannSiegelZ(
  t: number,
  tolerance?: Partial<ToleranceConfig>,
  options: EvaluateOptions = {},
): number {
  const theta = riemannSiegelTheta(t, resolveLogGamma(options));
  const zeta = evaluate({ re: 0.5, im: t }, tolerance, options).value;
  return multiply(exp({ re: 0, im: theta }), zeta).re;
}
