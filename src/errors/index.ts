/**
 * Error types for SMTP URI parsing.
 */

/**
 * SMTP URI error kinds.
 *
 * Malformed URIs are not represented here: the generic parser's own
 * `TypeError` reaches the caller unchanged.
 */
export enum SmtpUriErrorKind {
  /** Unknown format requested for decoded userinfo. */
  InvalidFormatArgument = 'invalid_format_argument',
  /** Parser registration rejected by the registry. */
  InvalidParser = 'invalid_parser',
}

/**
 * Error raised by SMTP URI accessors and the parser registry.
 */
export class SmtpUriError extends Error {
  /** Error kind. */
  readonly kind: SmtpUriErrorKind;
  /** Underlying cause. */
  readonly cause?: Error;

  constructor(kind: SmtpUriErrorKind, message: string, options?: { cause?: Error }) {
    super(message);
    this.name = 'SmtpUriError';
    this.kind = kind;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SmtpUriError);
    }
  }

  /**
   * Creates an error for an unknown userinfo format.
   */
  static invalidFormat(format: unknown, accepted: readonly string[]): SmtpUriError {
    return new SmtpUriError(
      SmtpUriErrorKind.InvalidFormatArgument,
      `Unknown format ${JSON.stringify(format)}. Should be one of ${JSON.stringify(accepted)}.`
    );
  }

  /**
   * Creates a registry error.
   */
  static invalidParser(message: string): SmtpUriError {
    return new SmtpUriError(SmtpUriErrorKind.InvalidParser, message);
  }

  /**
   * Converts to JSON.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
    };
  }
}

/**
 * Type guard for SmtpUriError.
 */
export function isSmtpUriError(error: unknown): error is SmtpUriError {
  return error instanceof SmtpUriError;
}
