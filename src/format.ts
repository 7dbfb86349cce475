import katex from 'katex';
import type { ComplexPoint, EvaluationResult } from './types/index.ts';
import { formatComplex, formatComplexLatex } from './math/complex.ts';

export type OutputFormat = 'text' | 'latex' | 'html';

export const CSV_HEADER = 're,im,zeta_re,zeta_im,error_estimate,terms,method';

export function formatEvaluation(
  s: ComplexPoint,
  result: EvaluationResult,
  format: OutputFormat = 'text',
  precision = 6,
): string {
  switch (format) {
    case 'text':
      return `ζ(${formatComplex(s, precision)}) = ${formatComplex(result.value, precision)}`;
    case 'latex':
      return formatEvaluationLatex(s, result, precision);
    case 'html':
      return katex.renderToString(formatEvaluationLatex(s, result, precision), { throwOnError: false });
  }
}

function formatEvaluationLatex(s: ComplexPoint, result: EvaluationResult, precision: number): string {
  return `\\zeta(${formatComplexLatex(s, precision)}) = ${formatComplexLatex(result.value, precision)}`;
}

/** One CSV line matching CSV_HEADER; full double precision. */
export function toCsvRow(s: ComplexPoint, result: EvaluationResult): string {
  return [
    s.re,
    s.im,
    result.value.re,
    result.value.im,
    result.errorEstimate,
    result.terms,
    result.method,
  ].join(',');
}
