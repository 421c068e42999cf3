/**
 * CSV output formatter for replay reports
 *
 * One row per replayed bar, for analysis in spreadsheets or notebooks.
 *
 * @module @avwap/dev-scripts/formatters/csv
 */

import type { ReplayReport } from '../replay.js';

const CSV_HEADER = ['symbol', 'endTime', 'status', 'value'];

/**
 * Format a replay report as CSV
 *
 * @example
 * console.log(formatCsv(report));
 * // symbol,endTime,status,value
 * // SPY,2024-05-10T09:31:00.000Z,Success,10.125
 */
export function formatCsv(report: ReplayReport): string {
  const rows = report.results.map((result) =>
    [report.symbol, result.time ?? '', result.status, String(result.value)].map(escapeCsv).join(',')
  );

  return [CSV_HEADER.join(','), ...rows].join('\n');
}

/**
 * Quote a field if it contains a comma, quote or newline
 */
function escapeCsv(field: string): string {
  if (/[",\n]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}
