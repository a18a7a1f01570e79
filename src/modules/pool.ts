import { Pool } from '../types/pool';
import { validatePositive } from '../utils/validation';

/**
 * Immutable constant-product pool snapshot.
 *
 * Reserves follow from liquidity `L` and price `P`:
 * base `x = L / sqrt(P)`, quote `y = L * sqrt(P)`, hence `x * y = L^2`
 * and `y / x = P`.
 */
export class PoolState implements Pool {
  public readonly liquidity: number;
  public readonly price: number;

  constructor(liquidity: number, price: number) {
    validatePositive(liquidity, 'liquidity');
    validatePositive(price, 'price');
    this.liquidity = liquidity;
    this.price = price;
    Object.freeze(this);
  }

  public baseReserves(): number {
    return this.liquidity / Math.sqrt(this.price);
  }

  public quoteReserves(): number {
    return this.liquidity * Math.sqrt(this.price);
  }

  public invariant(): number {
    return this.liquidity * this.liquidity;
  }
}

/**
 * Build a pool snapshot.
 *
 * @throws InvalidArgumentError unless both inputs are strictly positive
 */
export function makePoolState(liquidity: number, price: number): PoolState {
  return new PoolState(liquidity, price);
}
