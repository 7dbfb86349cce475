import { complex, lgamma } from 'mathjs';
import type { ComplexPoint, EvaluateOptions, GammaFunction, LogGammaFunction } from '../types/index.ts';
import { log } from './complex.ts';

/**
 * log Γ(z) via mathjs. Off the real axis this is the continuous branch of
 * the log-gamma function, so the imaginary part can be far outside (-π, π].
 * Real arguments are expected to be positive.
 */
export const mathjsLogGamma: LogGammaFunction = (z: ComplexPoint): ComplexPoint => {
  if (z.im === 0) {
    return { re: lgamma(z.re), im: 0 };
  }
  const result = lgamma(complex(z.re, z.im));
  return { re: result.re, im: result.im };
};

/** Adapts a plain Γ implementation; overflows wherever Γ itself does. */
export function logGammaFromGamma(gamma: GammaFunction): LogGammaFunction {
  return z => log(gamma(z));
}

export function resolveLogGamma(options: EvaluateOptions): LogGammaFunction {
  if (options.logGamma) return options.logGamma;
  if (options.gamma) return logGammaFromGamma(options.gamma);
  return mathjsLogGamma;
}
