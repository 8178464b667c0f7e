/**
 * Front door for URI parsing.
 *
 * Strings starting with `smtp` (which covers `smtps` and every `+modifier`
 * variant) become an `SmtpUri`; everything else goes to the generic WHATWG
 * URL parser unchanged.
 */

import { SMTP_SCHEME } from '../config';
import { SmtpUriError } from '../errors';
import { Logger, createNoopLogger } from '../observability';
import { SmtpUri } from '../uri';

/**
 * Values a registry can produce.
 */
export type ParsedUriValue = SmtpUri | URL;

/**
 * Result of parsing `T`: strings become parsed URIs, anything else is
 * returned as is. Distributes over unions, so `string | undefined` gives
 * `ParsedUriValue | undefined`.
 */
export type ParsedUriResult<T> = T extends string ? ParsedUriValue : T;

/**
 * Parses a URI string.
 */
export type UriParser = (input: string) => ParsedUriValue;

/**
 * Options for UriParserRegistry.
 */
export interface UriParserRegistryOptions {
  /** Parser for inputs no registered prefix matches. Defaults to `new URL()`. */
  fallback?: UriParser;
  /** Logger for dispatch decisions. Defaults to a no-op logger. */
  logger?: Logger;
}

/**
 * The generic parser.
 */
export function parseGenericUri(input: string): URL {
  return new URL(input);
}

/**
 * Scheme-prefix strategy table.
 *
 * The longest registered prefix that the input starts with selects the
 * parser. Logs the matched prefix, never the URI.
 */
export class UriParserRegistry {
  private readonly parsers = new Map<string, UriParser>();
  private readonly fallback: UriParser;
  private readonly logger: Logger;

  constructor(options: UriParserRegistryOptions = {}) {
    this.fallback = options.fallback ?? parseGenericUri;
    this.logger = (options.logger ?? createNoopLogger()).withScope('uri-registry');
  }

  /**
   * Registers a parser for inputs starting with `prefix`, replacing any
   * parser already registered for it.
   */
  register(prefix: string, parser: UriParser): this {
    if (prefix === '') {
      throw SmtpUriError.invalidParser('Parser prefix must not be empty');
    }
    if (this.parsers.has(prefix)) {
      this.logger.warn('Replacing registered parser', { prefix });
    }
    this.parsers.set(prefix, parser);
    return this;
  }

  /**
   * Removes the parser for `prefix`. Returns false if none was registered.
   */
  unregister(prefix: string): boolean {
    return this.parsers.delete(prefix);
  }

  /** Returns true if a parser is registered for `prefix`. */
  has(prefix: string): boolean {
    return this.parsers.has(prefix);
  }

  /** Registered prefixes. */
  prefixes(): string[] {
    return [...this.parsers.keys()];
  }

  /**
   * Parses a URI string. Non-string input is returned untouched.
   *
   * Errors thrown by the selected parser propagate unchanged.
   */
  parse(input: string): ParsedUriValue;
  parse<T>(input: T): ParsedUriResult<T>;
  parse(input: unknown): unknown {
    if (typeof input !== 'string') {
      return input;
    }

    const prefix = this.match(input);
    const parser = prefix === undefined ? undefined : this.parsers.get(prefix);
    if (parser === undefined) {
      this.logger.debug('Dispatching to generic parser');
      return this.fallback(input);
    }

    this.logger.debug('Dispatching to registered parser', { prefix });
    return parser(input);
  }

  private match(input: string): string | undefined {
    let longest: string | undefined;
    for (const prefix of this.parsers.keys()) {
      if (input.startsWith(prefix) && (longest === undefined || prefix.length > longest.length)) {
        longest = prefix;
      }
    }
    return longest;
  }
}

/**
 * Creates a registry with the SMTP parser registered.
 */
export function createDefaultRegistry(options?: UriParserRegistryOptions): UriParserRegistry {
  return new UriParserRegistry(options).register(SMTP_SCHEME, SmtpUri.parse);
}

const frontDoor = createDefaultRegistry();

/**
 * Parses any URI string, producing an `SmtpUri` for `smtp*` strings and a
 * `URL` otherwise. Non-string input is returned untouched.
 */
export function parseUri(input: string): ParsedUriValue;
export function parseUri<T>(input: T): ParsedUriResult<T>;
export function parseUri(input: unknown): unknown {
  return frontDoor.parse(input);
}
