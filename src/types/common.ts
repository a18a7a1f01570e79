/**
 * Direction of a trade, named from the trader's side of the base asset.
 */
export enum TradeDirection {
  /** Trader pays quote into the pool and receives base. */
  BUY_BASE = 'BUY_BASE',
  /** Trader pays base into the pool and receives quote. */
  SELL_BASE = 'SELL_BASE',
  /** Identical pool states; nothing changes hands. */
  NONE = 'NONE',
}

/**
 * Result wrapper for calculator edits.
 */
export interface Result<T> {
  success: boolean;
  data?: T;
  error?: CpmmError;
}

/**
 * Structured error carried by a failed Result.
 */
export interface CpmmError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Logger interface for calculator instrumentation.
 *
 * Implement this interface to receive debug, info, and error logs
 * from CpmmCalculator. Defaults to undefined (no logging).
 */
export interface Logger {
  /** Debug-level log for edits and recomputes. */
  debug(msg: string, data?: unknown): void;
  /** Info-level log for lifecycle events. */
  info(msg: string, data?: unknown): void;
  /** Error-level log for failed recomputes. */
  error(msg: string, err?: unknown): void;
}
