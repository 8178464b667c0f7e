/**
 * Credentials carried in the userinfo part of an SMTP URI.
 */

import { SmtpUriError } from '../errors';
import { UserinfoFormat } from '../config';

/**
 * Secure string wrapper for credentials.
 * Prevents accidental logging of sensitive values.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /** Gets the secret value. */
  expose(): string {
    return this.value;
  }

  /** Prevents accidental logging. */
  toString(): string {
    return '[REDACTED]';
  }

  /** Prevents accidental JSON serialization. */
  toJSON(): string {
    return '[REDACTED]';
  }
}

/**
 * Decoded credentials. Blank parts are absent, never empty strings.
 */
export interface Credentials {
  user?: string;
  password?: SecretString;
}

/** Decoded userinfo as a `[user, password]` pair. */
export type UserinfoTuple = [user: string | undefined, password: string | undefined];

/** Decoded userinfo as a mapping; keys are present only with a value. */
export interface UserinfoHash {
  user?: string;
  password?: string;
}

export const USERINFO_FORMATS: readonly string[] = Object.values(UserinfoFormat);

/**
 * Type guard for supported userinfo formats.
 */
export function isUserinfoFormat(format: string): format is UserinfoFormat {
  return USERINFO_FORMATS.includes(format);
}

/**
 * Returns the string unless it is blank.
 */
export function presence(value: string | undefined): string | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value;
}

/**
 * Splits raw userinfo at the first `:` and percent-decodes both parts.
 *
 * Throws `URIError` on invalid percent-encoding.
 */
export function decodeCredentials(userinfo: string): Credentials {
  const separator = userinfo.indexOf(':');
  const rawUser = separator === -1 ? userinfo : userinfo.slice(0, separator);
  const rawPassword = separator === -1 ? undefined : userinfo.slice(separator + 1);

  const user = presence(decodeURIComponent(rawUser));
  const password = rawPassword === undefined ? undefined : presence(decodeURIComponent(rawPassword));

  const credentials: Credentials = {};
  if (user !== undefined) {
    credentials.user = user;
  }
  if (password !== undefined) {
    credentials.password = new SecretString(password);
  }
  return credentials;
}

/**
 * Renders credentials in the requested format.
 */
export function formatUserinfo(credentials: Credentials, format: UserinfoFormat.String): string;
export function formatUserinfo(credentials: Credentials, format: UserinfoFormat.Array): UserinfoTuple;
export function formatUserinfo(credentials: Credentials, format: UserinfoFormat.Hash): UserinfoHash;
export function formatUserinfo(
  credentials: Credentials,
  format: string
): string | UserinfoTuple | UserinfoHash;
export function formatUserinfo(
  credentials: Credentials,
  format: string
): string | UserinfoTuple | UserinfoHash {
  const user = credentials.user;
  const password = credentials.password?.expose();

  switch (format) {
    case UserinfoFormat.String:
      return [user, password].filter((part): part is string => part !== undefined).join(':');

    case UserinfoFormat.Array:
      return [user, password];

    case UserinfoFormat.Hash: {
      const hash: UserinfoHash = {};
      if (user !== undefined) {
        hash.user = user;
      }
      if (password !== undefined) {
        hash.password = password;
      }
      return hash;
    }

    default:
      throw SmtpUriError.invalidFormat(format, USERINFO_FORMATS);
  }
}
