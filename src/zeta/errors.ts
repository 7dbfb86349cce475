import type { ComplexPoint } from '../types/index.ts';

export class ZetaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Argument is not a finite complex number, or a tolerance setting is out of range. */
export class InvalidArgumentError extends ZetaError {
  readonly value: unknown;

  constructor(message: string, value: unknown) {
    super(message);
    this.value = value;
  }
}

/** ζ(s) has its only pole at s = 1. */
export class PoleError extends ZetaError {
  readonly argument: ComplexPoint;

  constructor(argument: ComplexPoint) {
    super('ζ(s) has a pole at s = 1');
    this.argument = { re: argument.re, im: argument.im };
  }
}
