export { CpmmCalculator } from './calculator';
export { CalculatorConfig, DEFAULTS, FORMAT, SLIDER, SLIDER_CENTER, PERCENT_DENOMINATOR } from './config';
export {
  CpmmCalculatorError,
  InvalidArgumentError,
  ValidationError,
  mapError,
} from './errors';
export { PoolState, makePoolState } from './modules/pool';
export { computeTrade } from './modules/trade';
export { createSessionState, recompute } from './modules/session';
export { sliderToPrice, priceToSlider } from './utils/slider';
export { formatNumber } from './utils/format';
export {
  parseNumericInput,
  parseFieldInput,
  validatePositive,
  validateFeeFraction,
  validateFeePercent,
} from './utils/validation';
export * from './types/common';
export * from './types/pool';
export * from './types/trade';
export * from './types/session';
