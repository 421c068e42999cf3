/**
 * Replays a bar fixture through an anchored VWAP and collects the results
 *
 * @module @avwap/dev-scripts/replay
 */

import { IndicatorStatus, InvalidAnchorError, type IndicatorResult } from '@avwap/contracts';
import { AnchoredVwap, type AnchorInput, type PriceSelector } from '@avwap/indicators';
import type { Logger } from '@avwap/logger';
import type { BarFixture } from './fixture.js';

export interface ReplayOptions {
  /** Overrides the fixture's anchor */
  anchor?: AnchorInput;
  priceSelector?: PriceSelector;
  logger?: Logger;
}

export interface ReplaySummary {
  /** Last successful VWAP, 0 if none */
  value: number;
  isReady: boolean;
  samples: number;
  statusCounts: Record<IndicatorStatus, number>;
}

export interface ReplayReport {
  indicator: string;
  symbol: string;
  anchor: string;
  barCount: number;
  results: IndicatorResult[];
  summary: ReplaySummary;
}

/**
 * Run every fixture bar through a fresh AnchoredVwap
 *
 * @throws {InvalidAnchorError} When neither options nor fixture give a valid anchor
 *
 * @example
 * const report = runReplay(loadBarFixture('fixtures/spy-open.json'));
 * report.summary.value; // 10.725
 */
export function runReplay(fixture: BarFixture, options: ReplayOptions = {}): ReplayReport {
  const anchor = options.anchor ?? fixture.anchor;
  if (anchor === undefined) {
    throw new InvalidAnchorError('No anchor given: pass --anchor or set "anchor" in the fixture', {
      anchor,
      symbol: fixture.symbol,
    });
  }

  const vwap = new AnchoredVwap(anchor, {
    priceSelector: options.priceSelector,
    logger: options.logger,
  });
  const statusCounts: Record<IndicatorStatus, number> = {
    [IndicatorStatus.Success]: 0,
    [IndicatorStatus.InvalidInput]: 0,
    [IndicatorStatus.MathError]: 0,
  };

  const results = fixture.bars.map((bar) => {
    const result = vwap.update(bar);
    statusCounts[result.status]++;
    return result;
  });

  const report: ReplayReport = {
    indicator: vwap.name,
    symbol: fixture.symbol,
    anchor: vwap.anchor,
    barCount: fixture.bars.length,
    results,
    summary: {
      value: vwap.current.value,
      isReady: vwap.isReady,
      samples: vwap.samples,
      statusCounts,
    },
  };

  options.logger?.info('Replay complete', {
    indicator: report.indicator,
    symbol: report.symbol,
    bars: report.barCount,
    value: report.summary.value,
    ready: report.summary.isReady,
  });

  return report;
}
