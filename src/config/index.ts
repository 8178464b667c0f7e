/**
 * Defaults, enums and output shapes for SMTP URI configuration.
 */

/** Library version. */
export const VERSION = '0.4.0';

/** Submission port used when nothing else applies (STARTTLS). */
export const SUBMISSION_PORT = 587;

/** Port for implicit TLS (`smtps`). */
export const IMPLICIT_TLS_PORT = 465;

/** Port used for local development hosts. */
export const LOCAL_PORT = 25;

/** Hosts that get relaxed local defaults. Matched exactly. */
export const LOCAL_HOSTS: readonly string[] = ['127.0.0.1', 'localhost'];

/** Base scheme for plaintext or STARTTLS submission. */
export const SMTP_SCHEME = 'smtp';

/** Base scheme for implicit TLS. */
export const SMTPS_SCHEME = 'smtps';

/** Scheme token that downgrades transport security. */
export const INSECURE_TOKEN = 'insecure';

/** Scheme tokens that never name an auth mode. */
export const RESERVED_SCHEME_TOKENS: readonly string[] = [SMTP_SCHEME, SMTPS_SCHEME, INSECURE_TOKEN];

/** Auth mode that disables authentication. */
export const NO_AUTH = 'none';

/** Auth mode used when credentials are given without one. */
export const DEFAULT_AUTH = 'plain';

/**
 * STARTTLS behavior requested from the SMTP client.
 */
export enum StarttlsMode {
  /** Require STARTTLS. */
  Always = 'always',
  /** Use STARTTLS when the server offers it. */
  Auto = 'auto',
}

/**
 * Derived STARTTLS setting; `false` disables it.
 */
export type StarttlsSetting = StarttlsMode | false;

/**
 * Shapes in which decoded userinfo can be returned.
 */
export enum UserinfoFormat {
  /** `"user:password"`. */
  String = 'string',
  /** `[user, password]`. */
  Array = 'array',
  /** `{ user, password }`. */
  Hash = 'hash',
}

/**
 * Output projections of an SMTP URI.
 */
export enum ConfigFormat {
  /** Generic settings. */
  Default = 'default',
  /** Mail-framework (Action Mailer) `smtp_settings`. */
  ActionMailer = 'action_mailer',
  /** Short alias of `ActionMailer`. */
  Am = 'am',
}

/**
 * Generic SMTP settings. Absent values are omitted, never `undefined`.
 */
export interface SmtpSettings {
  /** Authentication mode. */
  auth?: string;
  /** HELO/EHLO domain. */
  domain?: string;
  /** Server host. */
  host?: string;
  /** Connect timeout, as given in the URI. */
  openTimeout?: number;
  /** Server port. */
  port: number;
  /** Read timeout, as given in the URI. */
  readTimeout?: number;
  /** Full scheme, modifiers included. */
  scheme: string;
  /** STARTTLS setting. */
  starttls: StarttlsSetting;
  /** Implicit TLS. */
  tls: boolean;
  /** Decoded user; only with `auth`. */
  user?: string;
  /** Decoded password; only with `auth`. */
  password?: string;
}

/**
 * Action Mailer `smtp_settings`.
 *
 * `tls`, `enableStarttls` and `enableStarttlsAuto` are only present when
 * true, and the STARTTLS flags never appear together with `tls`.
 */
export interface ActionMailerSettings {
  address?: string;
  authentication?: string;
  domain?: string;
  enableStarttls?: boolean;
  enableStarttlsAuto?: boolean;
  openTimeout?: number;
  port: number;
  readTimeout?: number;
  tls?: boolean;
  userName?: string;
  password?: string;
}
