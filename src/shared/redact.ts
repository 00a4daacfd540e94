// Patterns that indicate credential material (never log these)
const SECRET_PATTERNS = [
  /\b(?:AKIA|ASIA)[A-Z0-9]{16}\b/g,
  /bearer\s+\S+/gi,
  /aws_secret_access_key\s*[=:]\s*\S+/gi,
  /aws_session_token\s*[=:]\s*\S+/gi,
  /secret['":\s]+['"]?[A-Za-z0-9_\-./+]{8,}['"]?/gi,
  /token['":\s]+['"]?[A-Za-z0-9_\-./+=]{20,}['"]?/gi,
  /password['":\s]+['"]?\S+['"]?/gi,
];

const SECRET_KEYS =
  /^(token|secret|password|authorization|bearer|secretAccessKey|sessionToken|accessToken|aws_secret_access_key|aws_session_token)$/i;

/**
 * Redact potential credential values from a string for safe logging.
 */
export function redact(input: string): string {
  let output = input;
  for (const pattern of SECRET_PATTERNS) {
    output = output.replace(pattern, '[REDACTED]');
  }
  return output;
}

/**
 * Stringify an object, masking values stored under credential-like keys.
 */
export function safeStringify(obj: unknown, space?: number): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(
    obj,
    (key: string, value: unknown) => {
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) return '[Circular]';
        seen.add(value);
      }
      if (typeof value === 'string' && SECRET_KEYS.test(key)) {
        return '[REDACTED]';
      }
      return value;
    },
    space,
  );
}
