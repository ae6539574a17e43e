import type { ValidationIssue } from '@tunekit/core';

export type ScaleFormatErrorCode =
  | 'MALFORMED_COUNT'
  | 'MISSING_COUNT'
  | 'MALFORMED_RATIO'
  | 'MALFORMED_CENTS'
  | 'PITCH_COUNT_MISMATCH'
  | 'INVALID_SCALE';

export abstract class ScaleFormatError extends Error {
  abstract readonly code: ScaleFormatErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MalformedCountError extends ScaleFormatError {
  readonly code = 'MALFORMED_COUNT';

  constructor(
    readonly line: number,
    readonly text: string,
  ) {
    super(`Malformed number of pitches on line ${line}: "${text}".`);
  }
}

export class MissingCountError extends ScaleFormatError {
  readonly code = 'MISSING_COUNT';

  constructor() {
    super('Input ended before the number of pitches was declared.');
  }
}

export class MalformedRatioError extends ScaleFormatError {
  readonly code = 'MALFORMED_RATIO';

  constructor(
    readonly line: number,
    readonly text: string,
  ) {
    super(`Malformed pitch ratio on line ${line}: "${text}".`);
  }
}

export class MalformedCentsError extends ScaleFormatError {
  readonly code = 'MALFORMED_CENTS';

  constructor(
    readonly line: number,
    readonly text: string,
  ) {
    super(`Malformed cents value on line ${line}: "${text}".`);
  }
}

export class PitchCountMismatchError extends ScaleFormatError {
  readonly code = 'PITCH_COUNT_MISMATCH';

  constructor(
    readonly actual: number,
    readonly expected: number,
  ) {
    super(`Read ${actual} pitches but expected ${expected}.`);
  }
}

export class ScaleValidationError extends ScaleFormatError {
  readonly code = 'INVALID_SCALE';

  constructor(readonly issues: ValidationIssue[]) {
    super(`Validation failed: ${issues.map((issue) => issue.code).join(', ')}`);
  }
}

export const isScaleFormatError = (value: unknown): value is ScaleFormatError => value instanceof ScaleFormatError;
