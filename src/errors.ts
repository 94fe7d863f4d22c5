/**
 * Error taxonomy for ssa-js.
 *
 * Input errors (EMPTY_SERIES, NON_FINITE_VALUE, INVALID_WINDOW_LENGTH,
 * INDEX_OUT_OF_RANGE, INVALID_OPTIONS) are thrown by the call that receives
 * the bad value, before any factorization runs. NUMERIC_FAILURE wraps the
 * SVD primitive. SHAPE_MISMATCH is an internal assertion.
 */

export type SsaErrorCode =
  | "EMPTY_SERIES"
  | "NON_FINITE_VALUE"
  | "INVALID_WINDOW_LENGTH"
  | "INDEX_OUT_OF_RANGE"
  | "NUMERIC_FAILURE"
  | "SHAPE_MISMATCH"
  | "INVALID_OPTIONS";

export class SsaError extends Error {
  readonly code: SsaErrorCode;

  constructor(code: SsaErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class EmptySeriesError extends SsaError {
  constructor(readonly length: number) {
    super("EMPTY_SERIES", `series needs at least 2 samples, got ${length}`);
  }
}

export class NonFiniteValueError extends SsaError {
  constructor(readonly position: number, readonly value: number) {
    super("NON_FINITE_VALUE", `series[${position}] is not finite (${value})`);
  }
}

export class InvalidWindowLengthError extends SsaError {
  constructor(readonly windowLength: number, readonly seriesLength: number, detail?: string) {
    super(
      "INVALID_WINDOW_LENGTH",
      detail ?? `window length must be an integer in [2, ${seriesLength - 1}], got L=${windowLength}`,
    );
  }
}

export class IndexOutOfRangeError extends SsaError {
  constructor(readonly group: string, readonly index: number, readonly count: number) {
    super(
      "INDEX_OUT_OF_RANGE",
      `group "${group}": eigentriple index ${index} is outside [1, ${count}]`,
    );
  }
}

export class NumericFailureError extends SsaError {
  constructor(message: string, options?: ErrorOptions) {
    super("NUMERIC_FAILURE", message, options);
  }
}

export class ShapeMismatchError extends SsaError {
  constructor(readonly group: string, readonly expected: number, readonly actual: number) {
    super(
      "SHAPE_MISMATCH",
      `reconstruction of group "${group}" has length ${actual}, expected ${expected}`,
    );
  }
}

export class InvalidOptionsError extends SsaError {
  constructor(readonly what: string, readonly issues: string[]) {
    super("INVALID_OPTIONS", `invalid ${what}: ${issues.join("; ")}`);
  }
}
