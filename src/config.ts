import { Logger } from './types/common';
import { SessionState } from './types/session';

/**
 * Calculator configuration.
 */
export interface CalculatorConfig {
  /** Optional logger for edit/recompute instrumentation. */
  logger?: Logger;
  /** Overrides for the starting session; validated on construction. */
  initial?: Partial<SessionState>;
}

/**
 * Default calculator values.
 */
export const DEFAULTS = {
  initialLiquidity: 1000,
  initialPrice: 1.0,
  finalPrice: 1.1,
  feePercent: 0.3,
  centerPrice: 1.0,
  decades: 3,
} as const;

/**
 * Thresholds and digit counts for display formatting.
 */
export const FORMAT = {
  SMALL_THRESHOLD: 0.0001,
  LARGE_THRESHOLD: 1_000_000,
  FIXED_DIGITS: 6,
  SMALL_SCIENTIFIC_DIGITS: 6,
  LARGE_SCIENTIFIC_DIGITS: 4,
} as const;

/**
 * Range and step of the price slider widget.
 */
export const SLIDER = {
  MIN: 0,
  MAX: 1,
  STEP: 0.001,
} as const;

/**
 * Slider position that maps to the center price.
 */
export const SLIDER_CENTER = 0.5;

/**
 * Percent to fraction denominator for fees.
 */
export const PERCENT_DENOMINATOR = 100;
