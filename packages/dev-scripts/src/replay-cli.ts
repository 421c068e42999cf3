/**
 * avwap-replay command implementation
 *
 * Kept apart from bin/avwap-replay.ts so tests can drive it without
 * touching process state.
 */

import { isFixtureValidationError } from '@avwap/contracts';
import { attachGlobalHandlers, createLogger, type Logger } from '@avwap/logger';
import { parseArgs, formatHelp, outputResult, createResult } from './cli-utils.js';
import { loadConfig, type Config } from './config.js';
import { loadBarFixture } from './fixture.js';
import { formatCsv, formatSummary } from './formatters/index.js';
import { runReplay } from './replay.js';

export const COMMAND = 'avwap-replay';

export interface ReplayCliDeps {
  logger: Logger;
  /** Pretty output even without --pretty */
  defaultPretty?: boolean;
}

/**
 * Run the command and return its exit code
 *
 * @example
 * process.exitCode = runReplayCli(process.argv.slice(2), { logger });
 */
export function runReplayCli(argv: string[], deps: ReplayCliDeps): number {
  const { logger } = deps;
  const args = parseArgs(argv);
  const pretty = args.pretty || deps.defaultPretty === true;

  if (args.help) {
    console.log(
      formatHelp(
        COMMAND,
        'Replay a bar fixture through an anchored VWAP',
        'Required: --fixture=path.json\n' +
          'Optional: --anchor=ISO when the fixture has no "anchor" field\n' +
          'Optional: --csv for one row per bar'
      )
    );
    return 0;
  }

  if (!args.fixture) {
    outputResult(
      createResult(COMMAND, false, null, {
        errors: ['Missing required argument: --fixture=path.json'],
      }),
      pretty
    );
    return 2;
  }

  const warnings = args.remaining.map((arg) => `Ignored argument: ${arg}`);

  try {
    const fixture = loadBarFixture(args.fixture);
    const report = runReplay(fixture, { anchor: args.anchor, logger });

    if (!report.summary.isReady) {
      warnings.push('No bar at or after the anchor carried volume; VWAP is not available');
    }

    if (args.csv) {
      // CSV has no envelope for warnings
      for (const warning of warnings) {
        logger.warn(warning);
      }
      console.log(formatCsv(report));
    } else if (pretty) {
      console.log(formatSummary(report));
    } else {
      outputResult(createResult(COMMAND, true, report, { warnings }), false);
    }
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Replay failed', { fixture: args.fixture, error: message });

    const errors = isFixtureValidationError(error) ? [message, ...error.data.issues] : [message];
    outputResult(createResult(COMMAND, false, null, { errors, warnings }), pretty);
    return 2;
  }
}

/**
 * Load configuration, set up logging and run the command
 *
 * Invalid configuration is reported as a failed result with exit code 2,
 * before any logger exists.
 *
 * @example
 * process.exitCode = startReplayCli(process.argv.slice(2));
 */
export function startReplayCli(argv: string[], env: NodeJS.ProcessEnv = process.env): number {
  let config: Config;
  try {
    config = loadConfig(env);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    outputResult(createResult(COMMAND, false, null, { errors: [message] }), parseArgs(argv).pretty);
    return 2;
  }

  const logger = createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
  });
  attachGlobalHandlers(logger);

  return runReplayCli(argv, {
    logger: logger.child({ component: COMMAND }),
    defaultPretty: config.output.pretty,
  });
}
