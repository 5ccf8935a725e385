/**
 * Error types for termexpect
 *
 * Every error thrown by the package extends TermExpectError and carries a
 * stable string `code` so scripts can branch without parsing messages.
 */

/**
 * Base class for all termexpect errors.
 */
export class TermExpectError extends Error {
  /** Stable machine-readable code */
  public readonly code: string;

  /** Recovery suggestion, when there is one */
  public readonly hint?: string;

  constructor(message: string, code: string, hint?: string) {
    super(message);
    // Keeps instanceof working for subclasses after down-levelling
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'TermExpectError';
    this.code = code;
    this.hint = hint;
  }
}

/**
 * Thrown by `expect` when the stream ends and END_OF_STREAM was not one of
 * the accepted patterns.
 *
 * @example
 * ```typescript
 * try {
 *   await session.expect(PROMPT);
 * } catch (err) {
 *   if (err instanceof UnexpectedEndOfStreamError) {
 *     console.error(err.output);
 *   }
 * }
 * ```
 */
export class UnexpectedEndOfStreamError extends TermExpectError {
  /** Sources of the patterns that were being waited for */
  public readonly patterns: string[];

  /** Unmatched output collected by the failed expect call */
  public readonly output: string;

  constructor(patterns: string[], output: string) {
    super(
      `Stream ended while waiting for: ${patterns.join(', ') || '(no patterns)'}`,
      'ERR_END_OF_STREAM',
      'Add END_OF_STREAM to the pattern list if the process may exit here'
    );
    this.name = 'UnexpectedEndOfStreamError';
    this.patterns = patterns;
    this.output = output;
  }
}

/**
 * Thrown when a transport cannot be opened or written to.
 */
export class TransportError extends TermExpectError {
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'ERR_TRANSPORT');
    this.name = 'TransportError';
    this.cause = cause;
  }
}

/**
 * Thrown for invalid configuration values.
 */
export class ConfigError extends TermExpectError {
  constructor(message: string, hint?: string) {
    super(message, 'ERR_CONFIG', hint);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when command output does not have the expected shape.
 */
export class ParseError extends TermExpectError {
  public readonly input: string;

  constructor(message: string, input: string) {
    super(message, 'ERR_PARSE');
    this.name = 'ParseError';
    this.input = input;
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
