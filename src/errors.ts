/**
 * Typed error hierarchy for the CPMM calculator.
 *
 * All errors extend CpmmCalculatorError and carry a machine-readable
 * error code for programmatic handling plus human-readable messages.
 */

import { CpmmError } from './types/common';

/**
 * Base error class for all calculator errors.
 */
export class CpmmCalculatorError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CpmmCalculatorError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Plain structured form, as carried by a failed Result.
   */
  toJSON(): CpmmError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

/**
 * Engine contract violation: a non-positive liquidity or price, or a fee
 * fraction outside [0, 1).
 */
export class InvalidArgumentError extends CpmmCalculatorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_ARGUMENT', message, details);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Rejected user input or configuration.
 */
export class ValidationError extends CpmmCalculatorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, details);
    this.name = 'ValidationError';
  }
}

/**
 * Map a raw error to the appropriate typed error class.
 *
 * Calculator errors pass through unchanged; anything else is wrapped in
 * an UNKNOWN_ERROR carrying the original value.
 */
export function mapError(err: unknown): CpmmCalculatorError {
  if (err instanceof CpmmCalculatorError) return err;

  const message = err instanceof Error ? err.message : String(err);

  return new CpmmCalculatorError('UNKNOWN_ERROR', message, {
    originalError: err,
  });
}
