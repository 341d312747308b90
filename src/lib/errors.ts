export type LoadErrorKind = 'NotFound' | 'MissingColumns';

/**
 * Raised when the sample file cannot be turned into a clean table
 */
export class LoadError extends Error {
  readonly kind: LoadErrorKind;

  constructor(kind: LoadErrorKind, message: string) {
    super(message);
    this.name = 'LoadError';
    this.kind = kind;
  }
}

/**
 * Raised when a colour scale is requested for a range with max below min
 */
export class InvalidRangeError extends Error {
  constructor(min: number, max: number) {
    super(`Invalid colour range: max (${max}) is below min (${min})`);
    this.name = 'InvalidRangeError';
  }
}
