import { TradeDirection } from '../types/common';
import { Pool } from '../types/pool';
import { TradeResult } from '../types/trade';
import { validateFeeFraction } from '../utils/validation';

/**
 * Compute the trader's cash flows for moving a pool from `initial` to `final`.
 *
 * Whatever leaves the pool enters the wallet, so wallet deltas are the
 * negated pool reserve deltas. The fee is charged on the input side only:
 * base when the trader sells base, quote when the trader buys base. Wallet
 * deltas stay gross; the fee is reported alongside them, not subtracted.
 *
 * @param feeFraction - Fee as a fraction of the input amount, in [0, 1)
 * @throws InvalidArgumentError if feeFraction is out of range
 */
export function computeTrade(
  initial: Pool,
  final: Pool,
  feeFraction: number,
): TradeResult {
  validateFeeFraction(feeFraction);

  const priceDelta = final.price - initial.price;

  // initial - final == -(final - initial), without producing -0 on a no-op
  const baseGross = initial.baseReserves() - final.baseReserves();
  const quoteGross = initial.quoteReserves() - final.quoteReserves();

  let baseFeeCollected = 0;
  let quoteFeeCollected = 0;
  let direction = TradeDirection.NONE;

  if (baseGross < 0) {
    baseFeeCollected = -baseGross * feeFraction;
    direction = TradeDirection.SELL_BASE;
  } else if (quoteGross < 0) {
    quoteFeeCollected = -quoteGross * feeFraction;
    direction = TradeDirection.BUY_BASE;
  }

  return {
    priceDelta,
    baseWalletDelta: baseGross,
    quoteWalletDelta: quoteGross,
    baseFeeCollected,
    quoteFeeCollected,
    direction,
  };
}
