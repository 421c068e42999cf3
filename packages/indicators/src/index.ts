/**
 * @fileoverview Main entry point for @avwap/indicators package.
 *
 * @module @avwap/indicators
 */

// Anchored VWAP
export { AnchoredVwap, computeAnchoredVwapSeries } from './anchored-vwap.js';
export type { AnchorInput, AnchoredVwapOptions, AnchoredVwapState } from './anchored-vwap.js';

// Price selectors
export { ExactDecimal, ohlc4, hlc3, closePrice } from './price.js';
export type { PriceSelector } from './price.js';
