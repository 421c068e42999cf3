#!/usr/bin/env node

/**
 * avwap-replay - replay a bar fixture through an anchored VWAP
 *
 * USAGE:
 *   avwap-replay --fixture=path.json [--anchor=ISO] [--pretty|--csv]
 *
 * ENVIRONMENT:
 *   LOG_LEVEL      error | warn | info | debug (default: info)
 *   LOG_FORMAT     json | pretty (default: pretty)
 *   LOG_FILE       also write JSON logs to this file
 *   REPLAY_PRETTY  true to default to --pretty
 *
 * EXIT CODES:
 *   0 - Replay completed
 *   2 - Fatal error (invalid configuration, fixture not found, invalid format, missing anchor)
 */

import { startReplayCli } from '../src/replay-cli.js';

process.exitCode = startReplayCli(process.argv.slice(2));
