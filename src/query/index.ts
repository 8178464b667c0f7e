/**
 * Query-string settings of an SMTP URI.
 */

import { z } from 'zod';
import { StarttlsMode, StarttlsSetting } from '../config';
import { presence } from '../auth';

/**
 * Recognized query settings after coercion. Blank values are absent.
 */
export interface ParsedQuery {
  auth?: string;
  domain?: string;
  starttls?: StarttlsSetting;
  readTimeout?: number;
  openTimeout?: number;
}

/**
 * Coerces a `starttls` query value.
 *
 * `always` and `auto` select that mode, `false` disables STARTTLS and any
 * other value means `always`.
 */
export function coerceStarttls(value: string): StarttlsSetting {
  switch (value) {
    case StarttlsMode.Always:
      return StarttlsMode.Always;
    case StarttlsMode.Auto:
      return StarttlsMode.Auto;
    case 'false':
      return false;
    default:
      return StarttlsMode.Always;
  }
}

/**
 * Reads the leading integer of a value; `0` when there is none. Values
 * outside the safe integer range are clamped to it.
 */
export function toInteger(value: string): number {
  const digits = /^\s*([+-]?\d+)/.exec(value)?.[1];
  if (digits === undefined) {
    return 0;
  }
  const parsed = parseInt(digits, 10);
  return Math.min(Math.max(parsed, Number.MIN_SAFE_INTEGER), Number.MAX_SAFE_INTEGER);
}

const presentString = z
  .string()
  .optional()
  .transform((value) => presence(value));

/**
 * Zod schema for the recognized query keys. Unknown keys are stripped.
 */
const querySchema = z.object({
  auth: presentString,
  domain: presentString,
  starttls: presentString.transform((value) =>
    value === undefined ? undefined : coerceStarttls(value)
  ),
  read_timeout: presentString.transform((value) =>
    value === undefined ? undefined : toInteger(value)
  ),
  open_timeout: presentString.transform((value) =>
    value === undefined ? undefined : toInteger(value)
  ),
});

/**
 * Form-decodes a raw query string. A repeated key keeps its last value.
 */
export function decodeQuery(query: string | undefined): Record<string, string> {
  const values = new Map<string, string>();
  for (const [key, value] of new URLSearchParams(query ?? '')) {
    values.set(key, value);
  }
  return Object.fromEntries(values);
}

/**
 * Parses and coerces the query string of an SMTP URI.
 */
export function parseQuery(query: string | undefined): ParsedQuery {
  const settings = querySchema.parse(decodeQuery(query));

  const parsed: ParsedQuery = {};
  if (settings.auth !== undefined) {
    parsed.auth = settings.auth;
  }
  if (settings.domain !== undefined) {
    parsed.domain = settings.domain;
  }
  if (settings.starttls !== undefined) {
    parsed.starttls = settings.starttls;
  }
  if (settings.read_timeout !== undefined) {
    parsed.readTimeout = settings.read_timeout;
  }
  if (settings.open_timeout !== undefined) {
    parsed.openTimeout = settings.open_timeout;
  }
  return parsed;
}
