import { z } from 'zod';
import { InvalidArgumentError, ValidationError } from '../errors';
import { SessionField } from '../types/session';

/**
 * Plain decimal literal: optional sign, digits with an optional fraction,
 * optional exponent. Words such as "inf" or "NaN" are not accepted.
 */
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export const NumericInputSchema = z
  .string()
  .trim()
  .regex(DECIMAL_PATTERN, 'must be a decimal number')
  .transform((val) => Number(val))
  .refine((val) => Number.isFinite(val), { message: 'must be a finite number' });

export const PositiveSchema = z.number().finite().positive('must be strictly positive');

export const FeePercentSchema = z
  .number()
  .min(0, 'must be at least 0')
  .lt(100, 'must be less than 100');

export const FeeFractionSchema = z
  .number()
  .min(0, 'must be at least 0')
  .lt(1, 'must be less than 1');

export const SliderSchema = z.number().finite();

export const SessionStateSchema = z.object({
  initialLiquidity: PositiveSchema,
  initialPrice: PositiveSchema,
  finalPrice: PositiveSchema,
  feePercent: FeePercentSchema,
  centerPrice: PositiveSchema,
  decades: PositiveSchema,
});

const FIELD_SCHEMAS: Record<SessionField, z.ZodType<number>> = {
  initialLiquidity: PositiveSchema,
  initialPrice: PositiveSchema,
  finalPrice: PositiveSchema,
  centerPrice: PositiveSchema,
  decades: PositiveSchema,
  feePercent: FeePercentSchema,
  initialPriceSlider: SliderSchema,
  finalPriceSlider: SliderSchema,
};

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'invalid value';
}

/**
 * Validate that a value is a finite number strictly greater than zero.
 *
 * @throws InvalidArgumentError if the value is zero, negative, or not finite
 */
export function validatePositive(value: number, field: string): void {
  const parsed = PositiveSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`${field} ${firstIssue(parsed.error)}`, {
      field,
      value,
    });
  }
}

/**
 * Validate a fee fraction in [0, 1).
 *
 * @throws InvalidArgumentError if the fraction is out of range
 */
export function validateFeeFraction(value: number): void {
  const parsed = FeeFractionSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`feeFraction ${firstIssue(parsed.error)}`, {
      field: 'feeFraction',
      value,
    });
  }
}

/**
 * Validate a fee percentage in [0, 100).
 *
 * @throws ValidationError if the percentage is out of range
 */
export function validateFeePercent(value: number): void {
  const parsed = FeePercentSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`feePercent ${firstIssue(parsed.error)}`, {
      field: 'feePercent',
      value,
    });
  }
}

/**
 * Parse raw text typed into a numeric field.
 *
 * @throws ValidationError if the text is not a finite decimal number
 */
export function parseNumericInput(raw: string, field: string = 'value'): number {
  const parsed = NumericInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`${field} ${firstIssue(parsed.error)}`, {
      field,
      raw,
    });
  }
  return parsed.data;
}

/**
 * Parse and range-check raw input for one session field.
 *
 * Liquidity, prices, center price and decades must be strictly positive,
 * the fee must lie in [0, 100), and slider positions accept any finite
 * number.
 *
 * @throws ValidationError if the input is rejected
 */
export function parseFieldInput(field: SessionField, raw: string): number {
  const value = parseNumericInput(raw, field);
  const parsed = FIELD_SCHEMAS[field].safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`${field} ${firstIssue(parsed.error)}`, {
      field,
      raw,
      value,
    });
  }
  return parsed.data;
}
