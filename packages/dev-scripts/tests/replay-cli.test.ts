/**
 * avwap-replay command tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { fileURLToPath } from 'node:url';
import { createLogger } from '@avwap/logger';
import { runReplayCli, startReplayCli } from '../src/replay-cli.js';

const fixturePath = (name: string): string =>
  fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

describe('runReplayCli', () => {
  const logger = createLogger({ level: 'error', console: false });
  let log: MockInstance<typeof console.log>;

  /** Parses the single JSON line the command printed */
  function printedJson() {
    expect(log).toHaveBeenCalledTimes(1);
    return JSON.parse(String(log.mock.calls[0]?.[0]));
  }

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print help and exit 0', () => {
    expect(runReplayCli(['--help'], { logger })).toBe(0);
    expect(String(log.mock.calls[0]?.[0])).toContain(
      'avwap-replay - Replay a bar fixture through an anchored VWAP'
    );
  });

  it('should exit 2 without a fixture', () => {
    expect(runReplayCli([], { logger })).toBe(2);

    const output = printedJson();
    expect(output.success).toBe(false);
    expect(output.errors).toEqual(['Missing required argument: --fixture=path.json']);
  });

  it('should print the replay report as JSON', () => {
    expect(runReplayCli([`--fixture=${fixturePath('spy-open.json')}`], { logger })).toBe(0);

    const output = printedJson();
    expect(output.success).toBe(true);
    expect(output.command).toBe('avwap-replay');
    expect(output.data.summary.value).toBe(10.725);
    expect(output.data.results).toHaveLength(4);
    expect(output.warnings).toBeUndefined();
  });

  it('should print CSV with --csv', () => {
    expect(runReplayCli([`--fixture=${fixturePath('spy-open.json')}`, '--csv'], { logger })).toBe(0);

    const csv = String(log.mock.calls[0]?.[0]);
    expect(csv.split('\n')[0]).toBe('symbol,endTime,status,value');
    expect(csv.split('\n')[4]).toBe('SPY,2024-05-10T09:32:00.000Z,Success,10.725');
  });

  it('should log warnings instead of dropping them with --csv', () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => logger);

    const code = runReplayCli(
      [`--fixture=${fixturePath('spy-open.json')}`, '--csv', '--verbose'],
      { logger }
    );

    expect(code).toBe(0);
    expect(warn).toHaveBeenCalledWith('Ignored argument: --verbose');
  });

  it('should print the text summary when pretty output is the default', () => {
    runReplayCli([`--fixture=${fixturePath('spy-open.json')}`], { logger, defaultPretty: true });

    expect(String(log.mock.calls[0]?.[0])).toContain('Final VWAP: 10.7250 (ready)');
  });

  it('should warn when nothing after the anchor carried volume', () => {
    const code = runReplayCli(
      [`--fixture=${fixturePath('spy-open.json')}`, '--anchor=2024-05-10T10:00:00Z', '--verbose'],
      { logger }
    );

    expect(code).toBe(0);
    expect(printedJson().warnings).toEqual([
      'Ignored argument: --verbose',
      'No bar at or after the anchor carried volume; VWAP is not available',
    ]);
  });

  it('should list validation issues for an invalid fixture', () => {
    const path = fixturePath('invalid-bars.json');

    expect(runReplayCli([`--fixture=${path}`], { logger })).toBe(2);

    const output = printedJson();
    expect(output.errors[0]).toBe(`Fixture ${path} is invalid`);
    expect(output.errors[1]).toBe('bars.0.endTime: Invalid ISO 8601 timestamp');
  });

  it('should log and report an invalid anchor', () => {
    const error = vi.spyOn(logger, 'error').mockImplementation(() => logger);

    const code = runReplayCli(
      [`--fixture=${fixturePath('spy-open.json')}`, '--anchor=tomorrow'],
      { logger }
    );

    expect(code).toBe(2);
    expect(printedJson().errors).toEqual(['Anchor is not a valid timestamp']);
    expect(error).toHaveBeenCalledWith('Replay failed', {
      fixture: fixturePath('spy-open.json'),
      error: 'Anchor is not a valid timestamp',
    });
  });
});

describe('startReplayCli', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should report invalid configuration and exit 2', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const code = startReplayCli([`--fixture=${fixturePath('spy-open.json')}`], {
      LOG_LEVEL: 'verbose',
    });

    expect(code).toBe(2);
    expect(log).toHaveBeenCalledTimes(1);
    const output = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(output.success).toBe(false);
    expect(output.command).toBe('avwap-replay');
    expect(output.errors).toHaveLength(1);
    expect(output.errors[0]).toMatch(/^Configuration validation failed:\nlogging\.level: /);
  });
});
