import { TradeDirection } from './common';

/**
 * Economic consequence of moving a pool between two states at a fixed fee.
 *
 * Wallet deltas are signed from the trader's perspective
 * (positive = received, negative = paid) and are gross of fees.
 * Fees are reported separately and are never netted out of the deltas.
 */
export interface TradeResult {
  /** `final.price - initial.price` */
  priceDelta: number;
  /** Base received (+) or paid (-) by the trader */
  baseWalletDelta: number;
  /** Quote received (+) or paid (-) by the trader */
  quoteWalletDelta: number;
  /** Fee taken on base input; zero unless the trader pays base */
  baseFeeCollected: number;
  /** Fee taken on quote input; zero unless the trader pays quote */
  quoteFeeCollected: number;
  /** Which side the trader paid in */
  direction: TradeDirection;
}
