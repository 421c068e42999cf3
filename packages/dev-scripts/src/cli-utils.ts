/**
 * Shared CLI utilities for @avwap/dev-scripts
 *
 * - Argument parsing
 * - Consistent help text formatting
 * - Unified JSON/pretty output logic
 * - Standard result object structure
 *
 * All CLIs output JSON by default; --pretty switches to human-readable text.
 * Exit codes: 0 = success, 2 = error.
 */

/**
 * Parsed command-line arguments
 */
export interface ParsedArgs {
  help: boolean;           // --help: Show help text
  pretty: boolean;         // --pretty: Human-readable formatted output
  csv: boolean;            // --csv: One CSV row per bar
  fixture?: string;        // --fixture=path: Path to bar fixture file
  anchor?: string;         // --anchor=ISO: Anchor override
  remaining: string[];     // Unrecognised flags and positional arguments
}

/**
 * Standard result object structure returned by all CLIs
 */
export interface CliResult {
  success: boolean;
  command: string;
  timestamp: string;       // ISO 8601 timestamp of execution
  data: unknown;
  warnings?: string[];     // Non-fatal warnings
  errors?: string[];       // Fatal errors
}

/**
 * Parse command-line arguments
 *
 * @param argv - Typically process.argv.slice(2)
 *
 * @example
 * const args = parseArgs(['--fixture=bars.json', '--anchor=2024-05-10T09:30:00Z']);
 * // { help: false, pretty: false, csv: false, fixture: 'bars.json', anchor: '2024-05-10T09:30:00Z', remaining: [] }
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args: ParsedArgs = {
    help: false,
    pretty: false,
    csv: false,
    remaining: [],
  };

  for (const arg of argv) {
    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--pretty') {
      args.pretty = true;
    } else if (arg === '--csv') {
      args.csv = true;
    } else if (arg.startsWith('--fixture=')) {
      args.fixture = arg.slice('--fixture='.length);
    } else if (arg.startsWith('--anchor=')) {
      args.anchor = arg.slice('--anchor='.length);
    } else {
      args.remaining.push(arg);
    }
  }

  return args;
}

/**
 * Build standardized help text
 *
 * @example
 * console.log(formatHelp('avwap-replay', 'Replay bars through an anchored VWAP',
 *   'Required: --fixture=path.json'));
 */
export function formatHelp(
  commandName: string,
  description: string,
  additionalHelp?: string
): string {
  return `
${commandName} - ${description}

USAGE:
  ${commandName} [options]

OPTIONS:
  --help, -h        Show this help message
  --pretty          Human-readable formatted output (default: JSON)
  --csv             CSV output, one row per bar
  --fixture=path    Path to bar fixture file
  --anchor=ISO      Anchor timestamp (overrides the fixture's anchor)

OUTPUT:
  By default, outputs machine-readable JSON to stdout.
  Logs go to stderr.

EXIT CODES:
  0  Success
  2  Fatal error or invalid usage
${additionalHelp ? `\n${additionalHelp}\n` : ''}`;
}

/**
 * Output result to stdout in JSON or pretty format
 *
 * @example
 * outputResult(createResult('avwap-replay', true, report), args.pretty);
 */
export function outputResult(result: CliResult, pretty: boolean): void {
  if (!pretty) {
    console.log(JSON.stringify(result));
    return;
  }

  console.log('\n' + '='.repeat(60));
  console.log(`Command: ${result.command}`);
  console.log(`Status: ${result.success ? 'SUCCESS' : 'FAILED'}`);
  console.log(`Timestamp: ${result.timestamp}`);
  console.log('='.repeat(60));
  console.log('\nData:');
  console.log(JSON.stringify(result.data, null, 2));

  if (result.warnings && result.warnings.length > 0) {
    console.log('\nWarnings:');
    result.warnings.forEach((w) => console.log(`  - ${w}`));
  }

  if (result.errors && result.errors.length > 0) {
    console.log('\nErrors:');
    result.errors.forEach((e) => console.log(`  - ${e}`));
  }

  console.log('');
}

/**
 * Create a standard result object
 *
 * @example
 * const result = createResult('avwap-replay', false, null, {
 *   errors: ['Missing required argument: --fixture=path.json']
 * });
 */
export function createResult(
  command: string,
  success: boolean,
  data: unknown,
  options: {
    warnings?: string[];
    errors?: string[];
  } = {}
): CliResult {
  const result: CliResult = {
    success,
    command,
    timestamp: new Date().toISOString(),
    data,
  };

  if (options.warnings && options.warnings.length > 0) {
    result.warnings = options.warnings;
  }
  if (options.errors && options.errors.length > 0) {
    result.errors = options.errors;
  }

  return result;
}
