/**
 * Output formatters for replay reports
 *
 * @module @avwap/dev-scripts/formatters
 */

export { formatCsv } from './csv.js';
export { formatSummary } from './summary.js';
