import type { Logger } from 'winston';

export interface ComplexPoint {
  re: number;
  im: number;
}

/** Real-part band an argument falls into; decides the summation strategy. */
export type Region = 'POLE' | 'DIRECT' | 'ACCELERATED' | 'REFLECTED';

export type EvaluationMethod = Exclude<Region, 'POLE'>;

export interface ToleranceConfig {
  absoluteTolerance: number;
  relativeTolerance: number;
  maxTerms: number;
  minTerms: number; // guards against stopping early on oscillating partial sums
}

export interface EvaluationResult {
  value: ComplexPoint;
  errorEstimate: number;
  terms: number;
  method: EvaluationMethod;
  converged: boolean; // false when the term budget ran out before the target was met
}

export type GammaFunction = (z: ComplexPoint) => ComplexPoint;

/** log Γ(z) on any branch; only its exponential is used by the reflection. */
export type LogGammaFunction = (z: ComplexPoint) => ComplexPoint;

export interface EvaluateOptions {
  /** Takes precedence over `gamma`. Defaults to mathjs `lgamma`. */
  logGamma?: LogGammaFunction;
  gamma?: GammaFunction;
  logger?: Logger;
}

export type ParseResult =
  | { ok: true; value: ComplexPoint }
  | { ok: false; error: string };
