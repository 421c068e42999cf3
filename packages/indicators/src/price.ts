/**
 * @fileoverview Representative-price selectors for volume-weighted indicators.
 *
 * A selector reduces one bar to the single price that stands for its whole
 * interval. Selectors are injected into indicators at construction.
 *
 * @module @avwap/indicators/price
 */

import { Decimal } from 'decimal.js';
import type { TradeBar } from '@avwap/contracts';

/**
 * Maps a bar to the price used for its interval.
 */
export type PriceSelector = (bar: TradeBar) => Decimal;

/**
 * Decimal constructor for price and volume arithmetic, at forty significant digits.
 */
export const ExactDecimal = Decimal.clone({ precision: 40 });

/**
 * Arithmetic mean of open, high, low and close: (O + H + L + C) / 4.
 *
 * @example
 * ```typescript
 * ohlc4({ ...bar, open: 10, high: 11, low: 9, close: 10.5 }).toNumber(); // 10.125
 * ```
 */
export const ohlc4: PriceSelector = (bar) =>
  new ExactDecimal(bar.open).plus(bar.high).plus(bar.low).plus(bar.close).dividedBy(4);

/**
 * Typical price: (H + L + C) / 3.
 */
export const hlc3: PriceSelector = (bar) =>
  new ExactDecimal(bar.high).plus(bar.low).plus(bar.close).dividedBy(3);

/**
 * Closing price only.
 */
export const closePrice: PriceSelector = (bar) => new ExactDecimal(bar.close);
