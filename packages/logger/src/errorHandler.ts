/**
 * @fileoverview Global error handlers for uncaught exceptions and unhandled rejections
 * Ensures all errors are logged before process termination.
 */

import type { Logger } from './types.js';

/**
 * Time to wait for transports to flush before forcing exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

interface AttachedHandlers {
  uncaughtException: (error: Error) => void;
  unhandledRejection: (reason: unknown) => void;
  warning: (warning: Error) => void;
}

let attached: AttachedHandlers | null = null;

/**
 * Attaches global error handlers to the Node.js process.
 *
 * Uncaught exceptions and unhandled rejections are logged with their stack
 * and the process exits with code 1 once the logger has flushed. Process
 * warnings are logged at 'warn' and do not exit.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): void {
  if (attached) {
    logger.warn('Global error handlers already attached, skipping');
    return;
  }

  const handlers: AttachedHandlers = {
    uncaughtException: (error) => {
      logger.error('Uncaught exception detected - process will exit', {
        error: { name: error.name, message: error.message, stack: error.stack },
        event: 'uncaughtException',
        fatal: true,
      });
      gracefulExit(logger, 1);
    },

    unhandledRejection: (reason) => {
      const errorInfo =
        reason instanceof Error
          ? { name: reason.name, message: reason.message, stack: reason.stack }
          : { message: String(reason), value: reason };

      logger.error('Unhandled promise rejection detected - process will exit', {
        error: errorInfo,
        event: 'unhandledRejection',
        fatal: true,
      });
      gracefulExit(logger, 1);
    },

    warning: (warning) => {
      logger.warn('Process warning emitted', {
        warning: { name: warning.name, message: warning.message, stack: warning.stack },
        event: 'warning',
      });
    },
  };

  process.on('uncaughtException', handlers.uncaughtException);
  process.on('unhandledRejection', handlers.unhandledRejection);
  process.on('warning', handlers.warning);
  attached = handlers;

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });
}

/**
 * Removes handlers installed by {@link attachGlobalHandlers}. No-op when none are attached.
 */
export function detachGlobalHandlers(): void {
  if (!attached) {
    return;
  }

  process.off('uncaughtException', attached.uncaughtException);
  process.off('unhandledRejection', attached.unhandledRejection);
  process.off('warning', attached.warning);
  attached = null;
}

/**
 * Ends the logger and exits once it finishes, or after FLUSH_TIMEOUT_MS.
 */
function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    console.error(`[Logger] Flush timeout expired (${FLUSH_TIMEOUT_MS}ms), forcing exit`);
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
