/**
 * Redaction of secrets and personal data from log lines and job events.
 */

const REDACTED = "[REDACTED]";

/**
 * Keys whose values should always be redacted (matched case-insensitively).
 */
const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "authorization",
  "cookie",
  "ocp-apim-subscription-key",
  "openaiapikey",
  "cohereapikey",
  "databaseurl",
  "redisurl",
]);

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Replace email-like substrings in free text.
 */
export function redactText(text: string): string {
  return text.replace(EMAIL_REGEX, REDACTED);
}

/**
 * Redact a single key/value pair.
 *
 * - If the key matches a known sensitive field name the entire value is replaced
 *   with "[REDACTED]".
 * - If the value is a string that contains email-like patterns, those patterns
 *   are replaced with "[REDACTED]".
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  if (typeof value === "string") {
    return redactText(value);
  }

  return value;
}

/**
 * Apply {@link redactValue} through nested objects and arrays.
 * Used on job-event payloads before they are persisted.
 */
export function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    out[key] = redactNested(key, value);
  }
  return out;
}

function redactNested(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactNested(key, item));
  }
  if (isPlainObject(value)) {
    return redactRecord(value);
  }
  return redactValue(key, value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !(value instanceof Date);
}

/**
 * List of JSON-path strings suitable for Pino's `redact` option.
 */
export const REDACT_PATHS: string[] = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "authorization",
  "cookie",
  "openaiApiKey",
  "cohereApiKey",
  "databaseUrl",
  "redisUrl",
  // One level of nesting (e.g. headers.authorization)
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.authorization",
  "*.cookie",
  "*.openaiApiKey",
  "*.cohereApiKey",
  "*.databaseUrl",
  "*.redisUrl",
];
