/**
 * Text summary formatter for replay reports
 *
 * Output is deterministic: the same report always produces the same text.
 *
 * @module @avwap/dev-scripts/formatters/summary
 */

import { IndicatorStatus, type IndicatorResult } from '@avwap/contracts';
import type { ReplayReport } from '../replay.js';

/**
 * Generate a multi-line text summary of a replay
 *
 * @example
 * console.log(formatSummary(report));
 * // === Anchored VWAP Replay ===
 * // Indicator: AnchoredVWAP(20240510093000)
 * // Symbol: SPY | Anchor: 2024-05-10T09:30:00.000Z | Bars: 4
 * // ...
 */
export function formatSummary(report: ReplayReport): string {
  const { summary } = report;
  const lines: string[] = [];

  lines.push('=== Anchored VWAP Replay ===');
  lines.push(`Indicator: ${report.indicator}`);
  lines.push(`Symbol: ${report.symbol} | Anchor: ${report.anchor} | Bars: ${report.barCount}`);
  lines.push('');

  lines.push('Results:');
  for (const result of report.results) {
    lines.push(formatResultRow(result));
  }
  lines.push('');

  lines.push(
    `Final VWAP: ${summary.value.toFixed(4)} (${summary.isReady ? 'ready' : 'not ready'})`
  );
  lines.push(
    `Samples: ${summary.samples} | ` +
      `Success: ${summary.statusCounts[IndicatorStatus.Success]} | ` +
      `InvalidInput: ${summary.statusCounts[IndicatorStatus.InvalidInput]} | ` +
      `MathError: ${summary.statusCounts[IndicatorStatus.MathError]}`
  );

  return lines.join('\n');
}

/**
 * One aligned line per result; non-successful values print as '-'
 */
function formatResultRow(result: IndicatorResult): string {
  const time = (result.time ?? '(no bar)').padEnd(24);
  const status = result.status.padEnd(12);
  const value = result.status === IndicatorStatus.Success ? result.value.toFixed(4) : '-';
  return `  ${time}  ${status}  ${value}`;
}
