import type {
  ComplexPoint,
  EvaluateOptions,
  EvaluationResult,
  LogGammaFunction,
  ToleranceConfig,
} from '../types/index.ts';
import { formatComplex } from '../math/complex.ts';
import { resolveLogGamma } from '../math/gamma.ts';
import { logger as defaultLogger } from '../utils/logger.ts';
import { PrecisionController, resolveToleranceConfig } from './precision.ts';
import { classify } from './validator.ts';
import { sumDirect } from './direct-series.ts';
import { sumAccelerated } from './accelerated.ts';
import { reflect } from './reflection.ts';

function route(s: ComplexPoint, precision: PrecisionController, logGamma: LogGammaFunction): EvaluationResult {
  const region = classify(s);
  switch (region) {
    case 'DIRECT':
      return sumDirect(s, precision);
    case 'ACCELERATED':
      return sumAccelerated(s, precision);
    case 'REFLECTED': {
      const result = reflect(s, logGamma, z => route(z, precision, logGamma));
      // |χ| scales the inner bound; hold the scaled bound to this point's target.
      return { ...result, converged: result.converged && precision.meetsTarget(result.errorEstimate, result.value) };
    }
    default: {
      const unreachable: never = region;
      throw new Error(`Unhandled region: ${String(unreachable)}`);
    }
  }
}

/**
 * Evaluate ζ(s) anywhere except the pole at s = 1.
 *
 * Throws `InvalidArgumentError` for non-finite input or an invalid tolerance
 * config, and `PoleError` for s = 1. Running out of terms is not an error:
 * the result comes back with `converged: false` and the bound it reached.
 */
export function evaluate(
  s: ComplexPoint,
  tolerance?: Partial<ToleranceConfig>,
  options: EvaluateOptions = {},
): EvaluationResult {
  const log = options.logger ?? defaultLogger;
  const precision = new PrecisionController(resolveToleranceConfig(tolerance));
  const raw = route(s, precision, resolveLogGamma(options));

  const result: EvaluationResult = Object.freeze({
    ...raw,
    value: Object.freeze({ ...raw.value }),
  });

  log.debug('zeta evaluated', {
    s: formatComplex(s),
    method: result.method,
    terms: result.terms,
    errorEstimate: result.errorEstimate,
  });
  if (!result.converged) {
    log.warn('zeta evaluation stopped before reaching tolerance', {
      s: formatComplex(s),
      method: result.method,
      terms: result.terms,
      errorEstimate: result.errorEstimate,
      target: precision.target(result.value),
    });
  }
  return result;
}
