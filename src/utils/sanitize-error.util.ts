import { DEFAULT_CONFIG } from "../constants/relay.constants";

const SENSITIVE_KEYS = [
  "secret",
  "privateKey",
  "private_key",
  "apiKey",
  "api_key",
  "Authorization",
  "password",
];

/**
 * Replace `key=value`, `key: value` and `"key": "value"` pairs for known
 * sensitive keys, plus any literal occurrence of the given secret values.
 */
export function redactSensitiveValues(
  value: string,
  secrets: readonly string[] = [],
): string {
  let redacted = value;
  for (const secret of secrets) {
    if (secret.length === 0) continue;
    redacted = redacted.split(secret).join("<redacted>");
  }
  for (const key of SENSITIVE_KEYS) {
    const jsonRegex = new RegExp(`("${key}"\\s*:\\s*)"[^"]*"`, "gi");
    redacted = redacted.replace(jsonRegex, '$1"<redacted>"');
    const keyRegex = new RegExp(`\\b(${key})\\s*[:=]\\s*(["']?)[^\\s"',;}]+\\2`, "gi");
    redacted = redacted.replace(keyRegex, "$1=<redacted>");
  }
  return redacted;
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  if (maxLength <= 3) return text.slice(0, maxLength);
  return `${text.slice(0, maxLength - 3)}...`;
}

/**
 * One-line, redacted, length-capped description of a thrown value, safe to
 * send to chat.
 */
export function describeError(
  err: unknown,
  secrets: readonly string[] = [],
  maxLength: number = DEFAULT_CONFIG.ERROR_DESCRIPTION_MAX_LENGTH,
): string {
  let text: string;
  if (err instanceof Error) {
    text = err.message ? `${err.name}: ${err.message}` : err.name;
  } else {
    text = String(err);
  }
  const singleLine = text.replace(/\s+/g, " ").trim();
  return truncate(redactSensitiveValues(singleLine, secrets), maxLength);
}
