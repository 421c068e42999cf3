/**
 * @fileoverview Main entry point for @avwap/dev-scripts package.
 *
 * @module @avwap/dev-scripts
 */

export { parseArgs, formatHelp, outputResult, createResult } from './cli-utils.js';
export type { ParsedArgs, CliResult } from './cli-utils.js';

export { loadConfig, configSchema } from './config.js';
export type { Config } from './config.js';

export { loadBarFixture, parseBarFixture, barFixtureSchema, tradeBarSchema } from './fixture.js';
export type { BarFixture } from './fixture.js';

export { runReplay } from './replay.js';
export type { ReplayOptions, ReplayReport, ReplaySummary } from './replay.js';

export { runReplayCli, startReplayCli, COMMAND } from './replay-cli.js';

export { formatCsv, formatSummary } from './formatters/index.js';
