/**
 * @fileoverview Type definitions for the suite logger
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity of messages that will be logged.
 * - 'error': Failures that stop an operation
 * - 'warn': Conditions worth reviewing
 * - 'info': Normal operations
 * - 'debug': Per-bar detail (rejected bars, zero volume)
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/replay.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Optional file path; logs are written there in addition to console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;
}

/**
 * Context fields attached to every entry of a child logger.
 *
 * @example
 * ```typescript
 * const vwapLogger = logger.child({ component: 'replay', indicator: 'AnchoredVWAP(20240510093000)' });
 * ```
 */
export interface ChildLoggerContext {
  /** Component identifier (e.g., 'replay', 'indicators') */
  component?: string;

  /** Indicator name */
  indicator?: string;

  /** Trading symbol */
  symbol?: string;

  [key: string]: unknown;
}

/**
 * Winston's Logger, re-exported so packages depend on this one only.
 */
export type Logger = WinstonLogger;
