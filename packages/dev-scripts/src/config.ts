/**
 * Replay configuration loaded from the environment and validated with Zod
 */

import { z } from 'zod';
import { IndicatorError } from '@avwap/contracts';

/**
 * Configuration schema
 */
export const configSchema = z.object({
  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),

  output: z
    .object({
      pretty: z.boolean().default(false),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  REPLAY_PRETTY: 'output.pretty',
};

/**
 * Load configuration from environment and defaults
 *
 * @throws {IndicatorError} INVALID_CONFIG when a variable fails validation
 *
 * @example
 * const config = loadConfig({ LOG_LEVEL: 'debug' });
 * config.logging.level; // 'debug'
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig: Record<string, unknown> = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, parseEnvValue(value));
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new IndicatorError('INVALID_CONFIG', `Configuration validation failed:\n${issues.join('\n')}`, {
      issues,
    });
  }

  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setNestedProperty(target: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = target;
  for (const key of keys) {
    const existing = current[key];
    const next: Record<string, unknown> = isRecord(existing) ? existing : {};
    current[key] = next;
    current = next;
  }

  current[lastKey] = value;
}

/**
 * 'true'/'false' become booleans; everything else stays a string
 */
function parseEnvValue(value: string): string | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}
