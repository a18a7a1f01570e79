import { SLIDER } from '../config';
import { Pool } from './pool';
import { TradeResult } from './trade';

/**
 * Editable inputs of one calculator session.
 */
export interface SessionState {
  /** Liquidity shared by the initial and final pool states */
  initialLiquidity: number;
  /** Price before the trade */
  initialPrice: number;
  /** Price after the trade */
  finalPrice: number;
  /** Fee as a percentage in [0, 100) */
  feePercent: number;
  /** Price at slider position 0.5 */
  centerPrice: number;
  /** Decades of price covered by the full slider sweep */
  decades: number;
}

/**
 * Fields a presentation layer can edit. The two slider fields are not
 * stored; editing one rewrites the matching price.
 */
export type SessionField =
  | 'initialLiquidity'
  | 'initialPrice'
  | 'initialPriceSlider'
  | 'finalPrice'
  | 'finalPriceSlider'
  | 'feePercent'
  | 'centerPrice'
  | 'decades';

/**
 * Output of a full recompute.
 */
export interface Recomputation {
  initial: Pool;
  final: Pool;
  result: TradeResult;
}

/**
 * Display strings for every output of the calculator, plus the slider
 * positions matching the current prices.
 */
export interface CalculatorView {
  recomputation: Recomputation;
  initialLiquidity: string;
  initialPrice: string;
  finalPrice: string;
  feePercent: string;
  initialPriceSlider: number;
  finalPriceSlider: number;
  /** Range and step for building the slider widgets */
  sliderRange: typeof SLIDER;
  initialBaseReserves: string;
  initialQuoteReserves: string;
  finalBaseReserves: string;
  finalQuoteReserves: string;
  priceDelta: string;
  baseWalletDelta: string;
  quoteWalletDelta: string;
  baseFeeCollected: string;
  quoteFeeCollected: string;
}
