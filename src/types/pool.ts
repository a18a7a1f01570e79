/**
 * One snapshot of a constant-product pool.
 *
 * Reserves are derived from liquidity and price on every call and are
 * never stored: `x = L / sqrt(P)`, `y = L * sqrt(P)`, so `x * y = L^2`.
 */
export interface Pool {
  /** Liquidity `L`, strictly positive */
  readonly liquidity: number;
  /** Spot price `P` in quote per base, strictly positive */
  readonly price: number;
  /** Base asset reserves */
  baseReserves(): number;
  /** Quote asset reserves */
  quoteReserves(): number;
  /** Constant-product invariant `k = L^2` */
  invariant(): number;
}
