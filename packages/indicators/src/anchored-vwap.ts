/**
 * Anchored VWAP - streaming volume-weighted average price from a fixed anchor.
 *
 * Accumulates price x volume and volume for every bar whose end time is at
 * or after the anchor, and reports their ratio after each update. Bars that
 * end before the anchor are rejected without touching the accumulators.
 *
 * Key Features:
 * - O(1) work and memory per bar
 * - Exact decimal accumulation (decimal.js) with no floating-point drift
 * - Injectable representative-price selector (OHLC/4 by default)
 * - Status codes instead of exceptions for invalid input and zero volume
 *
 * @packageDocumentation
 */

import type { Decimal } from 'decimal.js';
import {
  IndicatorStatus,
  InvalidAnchorError,
  type IndicatorDataPoint,
  type IndicatorResult,
  type TradeBar,
} from '@avwap/contracts';
import type { Logger } from '@avwap/logger';
import { ExactDecimal, ohlc4, type PriceSelector } from './price.js';

/**
 * Instant accepted as an anchor: a Date, an ISO 8601 string or epoch milliseconds.
 */
export type AnchorInput = Date | string | number;

/**
 * Construction options for AnchoredVwap.
 */
export interface AnchoredVwapOptions {
  /** Display name; defaults to `AnchoredVWAP(yyyyMMddHHmmss)` of the anchor in UTC */
  name?: string;
  /** Representative price of a bar; defaults to {@link ohlc4} */
  priceSelector?: PriceSelector;
  /** Receives debug entries for rejected and zero-volume bars */
  logger?: Logger;
}

/**
 * Snapshot of the running accumulators.
 */
export interface AnchoredVwapState {
  /** Total volume of included bars */
  sumVolume: Decimal;
  /** Total price x volume of included bars */
  sumPriceVolume: Decimal;
  /** Number of update calls since construction or the last reset */
  samples: number;
}

/**
 * AnchoredVwap - incremental anchored volume-weighted average price
 *
 * Readiness follows accumulated volume: the indicator is ready once at least
 * one bar at or after the anchor contributed non-zero volume. Pre-anchor bars
 * count as samples but never make it ready.
 *
 * Not safe for concurrent writers; callers serialize `update` and `reset`.
 *
 * @example
 * ```typescript
 * const vwap = new AnchoredVwap('2024-05-10T09:30:00Z');
 *
 * vwap.update({
 *   timestamp: '2024-05-10T09:30:00Z',
 *   endTime: '2024-05-10T09:31:00Z',
 *   open: 10, high: 11, low: 9, close: 10.5,
 *   volume: 100
 * });
 * // { value: 10.125, status: 'Success', time: '2024-05-10T09:31:00Z' }
 * ```
 */
export class AnchoredVwap {
  /** At most one anchored bar is needed before a value is meaningful. */
  readonly warmUpPeriod = 1;

  readonly name: string;

  private readonly anchorMs: number;
  private readonly priceSelector: PriceSelector;
  private readonly logger: Logger | undefined;

  private sumVolume = new ExactDecimal(0);
  private sumPriceVolume = new ExactDecimal(0);
  private sampleCount = 0;
  private currentPoint: IndicatorDataPoint = { time: null, value: 0 };

  /**
   * @throws {InvalidAnchorError} If the anchor does not describe a valid instant
   */
  constructor(anchor: AnchorInput, options: AnchoredVwapOptions = {}) {
    const anchorMs = anchor instanceof Date ? anchor.getTime() : new Date(anchor).getTime();
    if (Number.isNaN(anchorMs)) {
      throw new InvalidAnchorError('Anchor is not a valid timestamp', { anchor });
    }

    this.anchorMs = anchorMs;
    this.name = options.name ?? defaultName(anchorMs);
    this.priceSelector = options.priceSelector ?? ohlc4;
    this.logger = options.logger;
  }

  /** Anchor as an ISO 8601 string */
  get anchor(): string {
    return new Date(this.anchorMs).toISOString();
  }

  get isReady(): boolean {
    return this.sumVolume.greaterThan(0);
  }

  get samples(): number {
    return this.sampleCount;
  }

  /** Last successful value; `{ time: null, value: 0 }` before the first one */
  get current(): IndicatorDataPoint {
    return { ...this.currentPoint };
  }

  get state(): AnchoredVwapState {
    return {
      sumVolume: this.sumVolume,
      sumPriceVolume: this.sumPriceVolume,
      samples: this.sampleCount,
    };
  }

  /**
   * Processes one bar and returns the resulting VWAP and status.
   *
   * - Missing bar, or bar ending before the anchor: `InvalidInput`, value 0,
   *   accumulators unchanged.
   * - Included bars with zero cumulative volume so far: `MathError`, value 0.
   * - Otherwise `Success` with sumPriceVolume / sumVolume.
   *
   * Only `Success` replaces {@link current}.
   */
  update(bar: TradeBar | null | undefined): IndicatorResult {
    this.sampleCount++;

    if (!bar) {
      this.logger?.debug('Bar rejected', { indicator: this.name, reason: 'missing' });
      return { value: 0, status: IndicatorStatus.InvalidInput, time: null };
    }

    const endMs = Date.parse(bar.endTime);
    if (Number.isNaN(endMs) || endMs < this.anchorMs) {
      this.logger?.debug('Bar rejected', {
        indicator: this.name,
        reason: Number.isNaN(endMs) ? 'invalid_end_time' : 'before_anchor',
        endTime: bar.endTime,
        anchor: this.anchor,
      });
      return { value: 0, status: IndicatorStatus.InvalidInput, time: bar.endTime };
    }

    // Selectors may return a default-precision Decimal
    const price = new ExactDecimal(this.priceSelector(bar));
    this.sumVolume = this.sumVolume.plus(bar.volume);
    this.sumPriceVolume = this.sumPriceVolume.plus(price.times(bar.volume));

    if (this.sumVolume.isZero()) {
      this.logger?.debug('No cumulative volume since anchor', {
        indicator: this.name,
        endTime: bar.endTime,
      });
      return { value: 0, status: IndicatorStatus.MathError, time: bar.endTime };
    }

    const value = this.sumPriceVolume.dividedBy(this.sumVolume).toNumber();
    this.currentPoint = { time: bar.endTime, value };

    return { value, status: IndicatorStatus.Success, time: bar.endTime };
  }

  /**
   * Clears accumulators, sample count and current value. The anchor is kept.
   */
  reset(): void {
    this.sumVolume = new ExactDecimal(0);
    this.sumPriceVolume = new ExactDecimal(0);
    this.sampleCount = 0;
    this.currentPoint = { time: null, value: 0 };
  }
}

/**
 * Runs a fresh AnchoredVwap over `bars` and returns every result in order.
 *
 * @example
 * ```typescript
 * const results = computeAnchoredVwapSeries(bars, '2024-05-10T09:30:00Z');
 * const last = results[results.length - 1];
 * ```
 */
export function computeAnchoredVwapSeries(
  bars: readonly TradeBar[],
  anchor: AnchorInput,
  options?: AnchoredVwapOptions
): IndicatorResult[] {
  const indicator = new AnchoredVwap(anchor, options);
  return bars.map((bar) => indicator.update(bar));
}

// AnchoredVWAP(20240510093000)
function defaultName(anchorMs: number): string {
  const compact = new Date(anchorMs).toISOString().slice(0, 19).replace(/[-T:]/g, '');
  return `AnchoredVWAP(${compact})`;
}
