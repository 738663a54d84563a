/**
 * Core error handling for measura
 *
 * Only usage errors are thrown. Numerical trouble (a non-integrable density,
 * an empty sample) shows up as a non-finite number instead.
 */

/**
 * Error codes for the failures the library signals by throwing
 */
export enum ErrorCode {
  // numerals, signum
  UNSUPPORTED_OPERATION = 'UNSUPPORTED_OPERATION',
  // bad constructor or sampler arguments
  INVALID_INPUT = 'INVALID_INPUT',
  // bad quadrature options
  INVALID_CONFIG = 'INVALID_CONFIG',
}

/**
 * Thrown for usage errors; `context` holds the offending values
 *
 * @example
 * ```typescript
 * throw new MeasureError(
 *   ErrorCode.INVALID_CONFIG,
 *   'maxLevels must be an integer between 1 and 16',
 *   { option: 'maxLevels', value: 40 }
 * );
 * ```
 */
export class MeasureError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MeasureError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MeasureError);
    }
  }

  /**
   * Code, message and context on one line
   */
  toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }
}

/**
 * Type guard to check if an error is a MeasureError
 */
export function isMeasureError(error: unknown): error is MeasureError {
  return error instanceof MeasureError;
}

/**
 * Signal use of an arithmetic operation that has no meaning for measures.
 * Throws on every call.
 */
export function unsupported(operation: string): never {
  throw new MeasureError(
    ErrorCode.UNSUPPORTED_OPERATION,
    `${operation}: not supported for measures`,
    { operation }
  );
}
