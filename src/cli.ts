import { parseArgs } from 'node:util';
import type { ComplexPoint } from './types/index.ts';
import { parseComplexExpression } from './math/expression.ts';
import { evaluate } from './zeta/dispatcher.ts';
import { sampleSegment } from './zeta/batch.ts';
import { ZetaError } from './zeta/errors.ts';
import { CSV_HEADER, formatEvaluation, toCsvRow } from './format.ts';
import type { OutputFormat } from './format.ts';
import { logger } from './utils/logger.ts';

const USAGE = `Usage:
  zeta --at <s> [--format text|latex|html|csv]
  zeta --start <s> --end <s> [--step <n>] [--format csv|text|latex|html]

Complex arguments are expressions such as 2, 0.5+14.134725i, pi.
Pass negative values with an equals sign: --at=-1.`;

type CliFormat = OutputFormat | 'csv';
const FORMATS: readonly CliFormat[] = ['csv', 'text', 'latex', 'html'];

function isCliFormat(value: string): value is CliFormat {
  return FORMATS.some(f => f === value);
}

function parsePoint(flag: string, input: string): ComplexPoint {
  const parsed = parseComplexExpression(input);
  if (!parsed.ok) {
    throw new ZetaError(`--${flag}: ${parsed.error || 'empty expression'}`);
  }
  return parsed.value;
}

function render(s: ComplexPoint, format: CliFormat, out: string[]): void {
  const result = evaluate(s);
  out.push(format === 'csv' ? toCsvRow(s, result) : formatEvaluation(s, result, format));
}

export function run(argv: string[]): string[] {
  const { values } = parseArgs({
    args: argv,
    options: {
      at: { type: 'string' },
      start: { type: 'string' },
      end: { type: 'string' },
      step: { type: 'string', default: '1' },
      format: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: false,
  });

  if (values.help) return [USAGE];

  const format = values.format ?? (values.at !== undefined ? 'text' : 'csv');
  if (!isCliFormat(format)) {
    throw new ZetaError(`--format must be one of ${FORMATS.join(', ')}`);
  }

  const out: string[] = [];
  if (values.at !== undefined) {
    if (format === 'csv') out.push(CSV_HEADER);
    render(parsePoint('at', values.at), format, out);
    return out;
  }

  if (values.start === undefined || values.end === undefined) {
    throw new ZetaError(`Either --at or both --start and --end are required\n\n${USAGE}`);
  }
  const start = parsePoint('start', values.start);
  const end = parsePoint('end', values.end);
  const step = Number(values.step);

  if (format === 'csv') out.push(CSV_HEADER);
  for (const sample of sampleSegment(start, end, step)) {
    if ('error' in sample) {
      out.push(format === 'csv' ? `${sample.s.re},${sample.s.im},,,,,POLE` : 'ζ(1) is undefined (pole)');
      continue;
    }
    out.push(format === 'csv' ? toCsvRow(sample.s, sample.result) : formatEvaluation(sample.s, sample.result, format));
  }
  logger.info('sampled segment', { points: out.length - (format === 'csv' ? 1 : 0) });
  return out;
}

function main(): void {
  try {
    for (const line of run(process.argv.slice(2))) {
      process.stdout.write(`${line}\n`);
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`${message}\n`);
    process.exitCode = 1;
  }
}

if (process.argv[1] && import.meta.url.endsWith(process.argv[1].replace(/\\/g, '/'))) {
  main();
}
