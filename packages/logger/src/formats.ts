/**
 * @fileoverview Custom Winston formats for the suite logger
 * Includes secret redaction, standard fields and pretty-print output.
 */

import { format } from 'winston';

/**
 * Field-name patterns whose values are never logged.
 * Matches are case-insensitive (password, apiKey, API_KEY, token, ...).
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /pwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /auth/i,
  /private[_-]?key/i,
  /credit[_-]?card/i,
  /ssn/i,
];

const REDACTED = '[REDACTED]';

/** Winston fields that are never redacted */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label']);

/** Fields printed in front of the remaining metadata in pretty mode */
const CONTEXT_FIELDS = ['component', 'indicator', 'symbol'] as const;

export function isSensitiveFieldName(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with sensitive fields replaced, recursing into
 * plain objects and arrays. Error instances are passed through.
 *
 * @example
 * ```typescript
 * redactSensitiveFields({ feed: 'polygon', apiKey: 'test-secret' });
 * // { feed: 'polygon', apiKey: '[REDACTED]' }
 * ```
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item));
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    redacted[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(field);
  }
  return redacted;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Must run first in the format chain.
 *
 * @example
 * ```typescript
 * logger.info('Feed connected', { feed: 'polygon', apiKey: 'test-secret' });
 * // {"level":"info","message":"Feed connected","feed":"polygon","apiKey":"[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  const redacted = { ...info };

  for (const key of Object.keys(redacted)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    redacted[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(redacted[key]);
  }

  return redacted;
});

/**
 * Winston format that adds an ISO timestamp and expands Error stacks.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Formats one log entry as a single human-readable line.
 *
 * @example
 * ```typescript
 * // [2024-05-10T09:31:00.000Z] debug: Bar rejected indicator=AnchoredVWAP(20240510093000) reason="before_anchor"
 * ```
 */
export function formatPrettyLine(info: Record<string, unknown>): string {
  const { timestamp, level, message, stack, ...rest } = info;

  const context: string[] = [];
  for (const field of CONTEXT_FIELDS) {
    const value = rest[field];
    if (value !== undefined) {
      context.push(`${field}=${String(value)}`);
    }
    delete rest[field];
  }

  for (const [key, value] of Object.entries(rest)) {
    context.push(`${key}=${JSON.stringify(value)}`);
  }

  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const baseMsg = `[${String(timestamp)}] ${String(level)}: ${String(message)}${contextStr}`;

  return typeof stack === 'string' ? `${baseMsg}\n${stack}` : baseMsg;
}

/**
 * Winston format for human-readable output in development.
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => formatPrettyLine(info))
);
