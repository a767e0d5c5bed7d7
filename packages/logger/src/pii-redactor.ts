/**
 * Secret and PII redaction.
 *
 * Two layers: Pino's `redact` paths strip credentials from structured log
 * fields, and {@link redactText} masks contact details inside free text
 * (document snippets, provider error bodies).
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
  "googleapikey",
  "cohereapikey",
  "groqapikey",
  "openaiapikey",
  "qdrantapikey",
  "llmapikey",
]);

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

/** International numbers only (leading "+"), so counts and IDs are left alone. */
const PHONE_REGEX = /\+\d{1,3}(?:[\s.-]?\d{2,4}){2,5}/g;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Mask e-mail addresses and international phone numbers in free text.
 */
export function redactText(text: string): string {
  return text.replace(EMAIL_REGEX, REDACTED).replace(PHONE_REGEX, REDACTED);
}

/**
 * Redact a single key/value pair.
 *
 * - If the key matches a known sensitive field name the entire value is replaced
 *   with "[REDACTED]".
 * - String values have contact details masked via {@link redactText}.
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

const TOP_LEVEL_PATHS = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "authorization",
  "cookie",
  "googleApiKey",
  "cohereApiKey",
  "groqApiKey",
  "openaiApiKey",
  "qdrantApiKey",
  "llmApiKey",
];

/**
 * JSON-path strings for Pino's `redact` option, covering the top level and one
 * level of nesting (e.g. `config.apiKey`, `headers.authorization`).
 */
export const REDACT_PATHS: string[] = [
  ...TOP_LEVEL_PATHS,
  ...TOP_LEVEL_PATHS.map((path) => `*.${path}`),
];
