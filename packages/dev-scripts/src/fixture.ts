/**
 * Bar fixture loading and validation
 *
 * A fixture is a JSON file holding the bars of one symbol and, optionally,
 * the anchor to replay them from:
 *
 * ```json
 * { "symbol": "SPY", "anchor": "2024-05-10T09:30:00Z", "bars": [ ... ] }
 * ```
 *
 * @module @avwap/dev-scripts/fixture
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { FixtureValidationError } from '@avwap/contracts';

const isoTimestamp = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid ISO 8601 timestamp' });

export const tradeBarSchema = z.object({
  timestamp: isoTimestamp,
  endTime: isoTimestamp,
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().nonnegative(),
  symbol: z.string().optional(),
});

export const barFixtureSchema = z.object({
  symbol: z.string().min(1),
  anchor: isoTimestamp.optional(),
  bars: z.array(tradeBarSchema),
});

export type BarFixture = z.infer<typeof barFixtureSchema>;

/**
 * Validate already-parsed fixture data
 *
 * @param source - Path or label used in error messages
 * @throws {FixtureValidationError} When the data does not match the schema
 */
export function parseBarFixture(raw: unknown, source: string): BarFixture {
  const result = barFixtureSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new FixtureValidationError(`Fixture ${source} is invalid`, { source, issues });
  }

  return result.data;
}

/**
 * Read and validate a fixture file
 *
 * @throws {FixtureValidationError} When the file is not valid JSON or fails validation
 */
export function loadBarFixture(path: string): BarFixture {
  const text = readFileSync(path, 'utf-8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FixtureValidationError(`Fixture ${path} is not valid JSON`, {
      source: path,
      issues: [reason],
    });
  }

  return parseBarFixture(raw, path);
}
