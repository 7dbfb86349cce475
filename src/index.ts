export type {
  ComplexPoint,
  Region,
  EvaluationMethod,
  ToleranceConfig,
  EvaluationResult,
  GammaFunction,
  LogGammaFunction,
  EvaluateOptions,
  ParseResult,
} from './types/index.ts';
export { evaluate } from './zeta/dispatcher.ts';
export { classify, assertComplexPoint, DIRECT_THRESHOLD } from './zeta/validator.ts';
export { DEFAULT_TOLERANCE, resolveToleranceConfig } from './zeta/precision.ts';
export { ZetaError, InvalidArgumentError, PoleError } from './zeta/errors.ts';
export { functionalEquationFactor } from './zeta/reflection.ts';
export { riemannSiegelTheta, riemannSiegelZ } from './zeta/riemann-siegel.ts';
export { validateFunctionalEquation } from './zeta/functional-equation.ts';
export type { FunctionalEquationCheck } from './zeta/functional-equation.ts';
export { sampleSegment } from './zeta/batch.ts';
export type { Sample } from './zeta/batch.ts';
export { mathjsLogGamma, logGammaFromGamma } from './math/gamma.ts';
export { parseComplexExpression } from './math/expression.ts';
export { formatEvaluation, toCsvRow, CSV_HEADER } from './format.ts';
export type { OutputFormat } from './format.ts';
