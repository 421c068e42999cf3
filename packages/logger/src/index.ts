/**
 * @fileoverview Public API exports for @avwap/logger
 * Structured logging and global error handling
 */

// Core logger creation
export { createLogger, createChildLogger } from './createLogger.js';

// Global error handlers
export { attachGlobalHandlers, detachGlobalHandlers } from './errorHandler.js';

// Formats
export { redactSensitiveFields, isSensitiveFieldName, formatPrettyLine } from './formats.js';

// Type exports
export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
