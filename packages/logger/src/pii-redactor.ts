/**
 * Redaction of secrets and personal data before anything is logged or
 * persisted into a user-visible job log.
 */

const REDACTED = "[REDACTED]";

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

/**
 * Replace email addresses in free text.
 */
export function redactText(text: string): string {
  return text.replace(EMAIL_PATTERN, REDACTED);
}

const REDACT_KEYS = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "authorization",
  "cookie",
  "accessToken",
  "refreshToken",
  "credentials",
];

/**
 * Paths for pino's `redact` option: each key at the top level and one level down
 * (e.g. `config.apiKey`, `headers.authorization`).
 */
export const REDACT_PATHS: string[] = [...REDACT_KEYS, ...REDACT_KEYS.map((key) => `*.${key}`)];
