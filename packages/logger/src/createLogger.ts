/**
 * @fileoverview Main logger factory
 * Creates configured Winston logger instances with structured logging,
 * secret redaction, and console/file transports.
 */

import winston, { format } from 'winston';
import type { ChildLoggerContext, LoggerConfig, Logger } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * Format chain: secret redaction, then timestamp and error stacks at the
 * logger, then JSON or pretty-print output per transport. Files always get JSON.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Replay started', { symbol: 'SPY', bars: 390 });
 * ```
 *
 * @example
 * ```typescript
 * // File transport alongside console
 * const logger = createLogger({ level: 'debug', filePath: './logs/replay.log' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
  } = config;

  // Redaction must run before anything else touches the entry
  const baseFormat = format.combine(redactPII(), standardFields);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: json ? format.json() : prettyPrint,
        // Keep stdout free for command output
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        // File output is always JSON
        format: format.json(),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  return winston.createLogger({
    level,
    format: baseFormat,
    transports,
    // errorHandler.ts decides when to exit
    exitOnError: false,
  });
}

/**
 * Creates a child logger that adds `context` to every entry.
 *
 * @example
 * ```typescript
 * const replayLogger = createChildLogger(logger, { component: 'replay', symbol: 'SPY' });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
