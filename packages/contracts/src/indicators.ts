/**
 * @fileoverview Result types shared by streaming indicators.
 *
 * @module @avwap/contracts/indicators
 */

/**
 * Outcome of a single indicator update.
 *
 * Only `Success` carries an authoritative value. The other statuses are
 * ordinary return values, never thrown.
 */
export enum IndicatorStatus {
  /** Value computed normally */
  Success = 'Success',
  /** Input was missing or outside the range the indicator accepts */
  InvalidInput = 'InvalidInput',
  /** Value could not be computed (e.g., division by zero volume) */
  MathError = 'MathError',
}

/**
 * Result returned by every indicator update.
 *
 * @example
 * ```typescript
 * const result: IndicatorResult = {
 *   value: 10.725,
 *   status: IndicatorStatus.Success,
 *   time: '2024-05-10T09:32:00.000Z'
 * };
 * ```
 */
export interface IndicatorResult {
  /** Computed value; 0 when status is not Success */
  value: number;

  /** Status of this update */
  status: IndicatorStatus;

  /** End time of the bar that produced the result, null if no bar was given */
  time: string | null;
}

/**
 * Last successful value held by an indicator.
 */
export interface IndicatorDataPoint {
  time: string | null;
  value: number;
}

/**
 * Returns true if the result carries an authoritative value.
 */
export function isSuccessful(result: IndicatorResult): boolean {
  return result.status === IndicatorStatus.Success;
}
