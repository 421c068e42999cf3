/**
 * @fileoverview In-memory transport for logger tests
 */

import { Writable } from 'node:stream';
import winston, { format } from 'winston';
import type { Logger } from '../src/types.js';

export interface CapturedLines {
  lines: string[];
  /** Parsed JSON entries written so far */
  entries(): Record<string, unknown>[];
}

/**
 * Adds a JSON stream transport to `logger` that records every written line.
 */
export function captureJson(logger: Logger): CapturedLines {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(...chunk.toString('utf-8').split('\n').filter((line) => line.length > 0));
      callback();
    },
  });

  logger.add(new winston.transports.Stream({ stream, format: format.json() }));

  return {
    lines,
    entries: () => lines.map(parseEntry),
  };
}

function parseEntry(line: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(line);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Log line is not a JSON object: ${line}`);
  }
  return { ...parsed };
}

/** Lets winston's piped streams drain */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 20));
}
