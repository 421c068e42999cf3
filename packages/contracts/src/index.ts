/**
 * @fileoverview Main entry point for @avwap/contracts package.
 *
 * Exports the bar, result and error types shared across the suite.
 *
 * @module @avwap/contracts
 */

// Market data types
export type { TradeBar } from './market.js';

// Indicator result types
export type { IndicatorResult, IndicatorDataPoint } from './indicators.js';
export { IndicatorStatus, isSuccessful } from './indicators.js';

// Error classes and guards
export {
  IndicatorError,
  InvalidAnchorError,
  FixtureValidationError,
  isIndicatorError,
  isInvalidAnchorError,
  isFixtureValidationError,
} from './errors.js';
