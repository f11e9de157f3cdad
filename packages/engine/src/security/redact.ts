/**
 * Secret Redaction
 *
 * Replaces sensitive values in structured log data before it is written.
 */

const SENSITIVE_KEY = /secret|private|passphrase|seed|plaintext|(^|_)key$/i;

export const REDACTED = "[REDACTED]";

/**
 * Recursively copy `value`, replacing the value of every sensitive key with
 * `[REDACTED]`. bigints are rendered as strings so the result is JSON-safe.
 */
export function redactSecrets(value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactSecrets(item));
  }
  if (value instanceof Uint8Array) {
    return `<${value.length} bytes>`;
  }
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = SENSITIVE_KEY.test(key) ? REDACTED : redactSecrets(inner);
    }
    return out;
  }
  return value;
}
