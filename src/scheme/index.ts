/**
 * Decomposition of `smtp[s][+modifier...]` schemes.
 */

import { INSECURE_TOKEN, RESERVED_SCHEME_TOKENS, SMTPS_SCHEME } from '../config';

/**
 * Parts of an SMTP scheme.
 */
export interface SchemeParts {
  /** Scheme as given, e.g. `smtps+insecure+login`. */
  scheme: string;
  /** Implicit TLS (`smtps` base). */
  tls: boolean;
  /** The `insecure` token is present. */
  insecure: boolean;
  /** First non-reserved modifier, if any. */
  auth?: string;
}

/**
 * Splits a scheme into its `+`-delimited tokens.
 */
export function schemeTokens(scheme: string): string[] {
  return scheme.split('+');
}

/**
 * Decomposes an SMTP scheme.
 *
 * The base is the first token. Modifiers after the auth token are ignored.
 */
export function parseScheme(scheme: string): SchemeParts {
  const tokens = schemeTokens(scheme);
  const auth = tokens.slice(1).find((token) => token !== '' && !RESERVED_SCHEME_TOKENS.includes(token));

  const parts: SchemeParts = {
    scheme,
    tls: scheme.startsWith(SMTPS_SCHEME),
    insecure: tokens.includes(INSECURE_TOKEN),
  };
  if (auth !== undefined) {
    parts.auth = auth;
  }
  return parts;
}
