/**
 * @fileoverview Market data types consumed by indicators.
 *
 * Defines the OHLCV trade bar shape fed into streaming indicators. All types
 * are pure data structures with no I/O or business logic.
 *
 * @module @avwap/contracts/market
 */

/**
 * A single OHLCV (Open, High, Low, Close, Volume) bar covering one interval.
 *
 * Represents immutable market data. Indicators read it and never retain it
 * beyond the update call that receives it.
 *
 * @invariant high >= low
 * @invariant volume >= 0
 * @invariant timestamp <= endTime
 * @invariant timestamp and endTime are valid ISO 8601 strings
 *
 * @example
 * ```typescript
 * const bar: TradeBar = {
 *   timestamp: '2024-05-10T09:30:00.000Z',
 *   endTime: '2024-05-10T09:31:00.000Z',
 *   open: 10,
 *   high: 11,
 *   low: 9,
 *   close: 10.5,
 *   volume: 100
 * };
 * ```
 */
export interface TradeBar {
  /** ISO 8601 timestamp of bar open (UTC) */
  timestamp: string;

  /** ISO 8601 timestamp of bar close (UTC); anchoring is decided on this field */
  endTime: string;

  /** Opening price for the period */
  open: number;

  /** Highest price during the period */
  high: number;

  /** Lowest price during the period */
  low: number;

  /** Closing price for the period */
  close: number;

  /** Traded volume during the period */
  volume: number;

  /** Optional: symbol the bar belongs to (e.g., 'SPY') */
  symbol?: string;
}
