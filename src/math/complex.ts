import type { ComplexPoint } from '../types/index.ts';

export const ONE: ComplexPoint = Object.freeze({ re: 1, im: 0 });

export function add(a: ComplexPoint, b: ComplexPoint): ComplexPoint {
  return { re: a.re + b.re, im: a.im + b.im };
}

export function subtract(a: ComplexPoint, b: ComplexPoint): ComplexPoint {
  return { re: a.re - b.re, im: a.im - b.im };
}

export function multiply(a: ComplexPoint, b: ComplexPoint): ComplexPoint {
  return {
    re: a.re * b.re - a.im * b.im,
    im: a.re * b.im + a.im * b.re,
  };
}

export function divide(a: ComplexPoint, b: ComplexPoint): ComplexPoint {
  const denom = b.re * b.re + b.im * b.im;
  return {
    re: (a.re * b.re + a.im * b.im) / denom,
    im: (a.im * b.re - a.re * b.im) / denom,
  };
}

export function scale(z: ComplexPoint, k: number): ComplexPoint {
  return { re: z.re * k, im: z.im * k };
}

export function conjugate(z: ComplexPoint): ComplexPoint {
  return { re: z.re, im: -z.im };
}

export function magnitude(z: ComplexPoint): number {
  return Math.hypot(z.re, z.im);
}

export function argument(z: ComplexPoint): number {
  return Math.atan2(z.im, z.re);
}

/** e^(x + iy) = e^x (cos y + i sin y) */
export function exp(z: ComplexPoint): ComplexPoint {
  const r = Math.exp(z.re);
  if (z.im === 0) return { re: r, im: 0 };
  return { re: r * Math.cos(z.im), im: r * Math.sin(z.im) };
}

/** Principal logarithm, imaginary part in (-π, π]. */
export function log(z: ComplexPoint): ComplexPoint {
  return { re: Math.log(magnitude(z)), im: argument(z) };
}

/**
 * base^z for a positive real base: base^re * (cos(im ln base) + i sin(im ln base)).
 * Real exponents go through Math.pow so integer powers stay exact.
 */
export function realPow(base: number, z: ComplexPoint): ComplexPoint {
  const r = Math.pow(base, z.re);
  if (z.im === 0) return { re: r, im: 0 };
  const theta = z.im * Math.log(base);
  return { re: r * Math.cos(theta), im: r * Math.sin(theta) };
}

/** sin(x + iy) = sin x cosh y + i cos x sinh y */
export function sin(z: ComplexPoint): ComplexPoint {
  if (z.im === 0) return { re: Math.sin(z.re), im: 0 };
  return {
    re: Math.sin(z.re) * Math.cosh(z.im),
    im: Math.cos(z.re) * Math.sinh(z.im),
  };
}

export function isFinitePoint(z: ComplexPoint): boolean {
  return Number.isFinite(z.re) && Number.isFinite(z.im);
}

export function approxEqual(a: ComplexPoint, b: ComplexPoint, eps = 1e-10): boolean {
  return Math.abs(a.re - b.re) < eps && Math.abs(a.im - b.im) < eps;
}

export function formatComplex(z: ComplexPoint, precision = 6): string {
  const re = cleanFloat(z.re, precision);
  const im = cleanFloat(z.im, precision);

  if (im === 0) return `${re}`;
  if (re === 0) {
    if (im === 1) return 'i';
    if (im === -1) return '−i';
    return `${formatSignedIm(im)}i`;
  }
  const sign = im > 0 ? ' + ' : ' − ';
  const absIm = Math.abs(im);
  const imPart = absIm === 1 ? 'i' : `${absIm}i`;
  return `${re}${sign}${imPart}`;
}

function cleanFloat(x: number, precision: number): number {
  const cleaned = parseFloat(x.toFixed(precision));
  // Avoid "-0"
  return Object.is(cleaned, -0) ? 0 : cleaned;
}

function formatSignedIm(im: number): string {
  return im < 0 ? `−${Math.abs(im)}` : `${im}`;
}

/** Format a complex number in standard LaTeX form, e.g. "1 + 2i", "-3 - i" */
export function formatComplexLatex(z: ComplexPoint, precision = 6): string {
  const re = cleanFloat(z.re, precision);
  const im = cleanFloat(z.im, precision);

  if (re === 0 && im === 0) return '0';
  if (im === 0) return String(re);
  if (re === 0) {
    if (im === 1) return 'i';
    if (im === -1) return '-i';
    return `${im}i`;
  }
  const sign = im > 0 ? ' + ' : ' - ';
  const absIm = Math.abs(im);
  const imPart = absIm === 1 ? 'i' : `${absIm}i`;
  return `${re}${sign}${imPart}`;
}
