import { z } from 'zod';
import type { ComplexPoint, ToleranceConfig } from '../types/index.ts';
import { magnitude } from '../math/complex.ts';
import { InvalidArgumentError } from './errors.ts';

export const DEFAULT_TOLERANCE: Readonly<ToleranceConfig> = Object.freeze({
  absoluteTolerance: 1e-12,
  relativeTolerance: 1e-12,
  maxTerms: 100_000,
  minTerms: 10,
});

const toleranceSchema = z
  .object({
    absoluteTolerance: z.number().finite().nonnegative(),
    relativeTolerance: z.number().finite().nonnegative(),
    maxTerms: z.number().int().positive(),
    minTerms: z.number().int().positive(),
  })
  .refine(c => c.absoluteTolerance > 0 || c.relativeTolerance > 0, {
    message: 'absoluteTolerance and relativeTolerance cannot both be zero',
  })
  .refine(c => c.minTerms <= c.maxTerms, {
    message: 'minTerms must not exceed maxTerms',
    path: ['minTerms'],
  });

/** Merge a partial config over the defaults and validate it. Each call gets its own frozen copy. */
export function resolveToleranceConfig(partial: Partial<ToleranceConfig> = {}): Readonly<ToleranceConfig> {
  const parsed = toleranceSchema.safeParse({ ...DEFAULT_TOLERANCE, ...partial });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new InvalidArgumentError(`Invalid tolerance config: ${field}${issue.message}`, partial);
  }
  return Object.freeze(parsed.data);
}

/**
 * Stopping policy shared by the summers. Holds no state beyond its config,
 * so one instance can be handed down a reflection without side effects.
 */
export class PrecisionController {
  readonly config: Readonly<ToleranceConfig>;

  constructor(config: Readonly<ToleranceConfig>) {
    this.config = config;
  }

  get minTerms(): number {
    return this.config.minTerms;
  }

  get maxTerms(): number {
    return this.config.maxTerms;
  }

  /** Error allowed for a value of this size. */
  target(value: ComplexPoint): number {
    return Math.max(this.config.absoluteTolerance, this.config.relativeTolerance * magnitude(value));
  }

  meetsTarget(errorEstimate: number, value: ComplexPoint): boolean {
    return errorEstimate <= this.target(value);
  }

  isSatisfied(errorEstimate: number, value: ComplexPoint, terms: number): boolean {
    return terms >= this.config.minTerms && this.meetsTarget(errorEstimate, value);
  }

  canContinue(terms: number): boolean {
    return terms < this.config.maxTerms;
  }
}
