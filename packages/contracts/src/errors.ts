/**
 * @fileoverview Error taxonomy for the anchored VWAP suite.
 *
 * Defines structured error classes with machine-readable codes and
 * contextual data. Data-driven indicator outcomes (invalid input, zero
 * volume) are statuses, not errors; these classes cover programming and
 * configuration faults only.
 *
 * All errors extend IndicatorError and include:
 * - Unique error code (string constant)
 * - Structured data payload
 * - ISO timestamp
 *
 * @module @avwap/contracts/errors
 */

/**
 * Base error class for all suite errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new IndicatorError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class IndicatorError extends Error {
  /**
   * Machine-readable error code (e.g., 'INVALID_ANCHOR').
   */
  readonly code: string;

  /**
   * Structured error data for debugging.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when error was created.
   */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (data !== undefined) {
      this.data = data;
    }
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes error to JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when an indicator is constructed with an anchor that is not a valid instant.
 *
 * @example
 * ```typescript
 * throw new InvalidAnchorError('Anchor is not a valid timestamp', { anchor: 'yesterday' });
 * ```
 */
export class InvalidAnchorError extends IndicatorError {
  declare readonly data: {
    anchor: unknown;
    [key: string]: unknown;
  };

  /**
   * @param data.anchor - The rejected anchor value
   */
  constructor(message: string, data: { anchor: unknown; [key: string]: unknown }) {
    super('INVALID_ANCHOR', message, data);
  }
}

/**
 * Thrown when a bar fixture fails schema validation.
 *
 * @example
 * ```typescript
 * throw new FixtureValidationError('Fixture is invalid', {
 *   source: 'fixtures/spy.json',
 *   issues: ['bars.0.volume: Expected number, received string']
 * });
 * ```
 */
export class FixtureValidationError extends IndicatorError {
  declare readonly data: {
    source: string;
    issues: string[];
    [key: string]: unknown;
  };

  /**
   * @param data.source - Path or label of the fixture
   * @param data.issues - One line per validation issue
   */
  constructor(message: string, data: { source: string; issues: string[]; [key: string]: unknown }) {
    super('FIXTURE_VALIDATION', message, data);
  }
}

/**
 * Type guard to check if an error is an IndicatorError.
 *
 * @example
 * ```typescript
 * try {
 *   new AnchoredVwap(input);
 * } catch (err) {
 *   if (isIndicatorError(err)) {
 *     console.error(`[${err.code}]`, err.message);
 *   }
 * }
 * ```
 */
export function isIndicatorError(error: unknown): error is IndicatorError {
  return error instanceof IndicatorError;
}

export function isInvalidAnchorError(error: unknown): error is InvalidAnchorError {
  return error instanceof InvalidAnchorError;
}

export function isFixtureValidationError(error: unknown): error is FixtureValidationError {
  return error instanceof FixtureValidationError;
}
