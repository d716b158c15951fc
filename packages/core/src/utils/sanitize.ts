/**
 * Redaction for values that end up in log output.
 *
 * Extensions log request metadata freely; credentials carried in headers
 * or query strings must never reach the log sink.
 */

const SENSITIVE_KEYS = [
  'authorization',
  'proxy-authorization',
  'cookie',
  'set-cookie',
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
  'x-api-key',
];

const SECRET_PATTERNS: { regex: RegExp; replacement: string }[] = [
  { regex: /bearer\s+[a-zA-Z0-9-_.~+/]+=*/gi, replacement: 'Bearer [REDACTED_TOKEN]' },
  { regex: /basic\s+[a-zA-Z0-9+/]+=*/gi, replacement: 'Basic [REDACTED_CREDENTIALS]' },
  { regex: /([?&](?:access_token|api_key|apikey|token)=)[^&#\s]+/gi, replacement: '$1[REDACTED]' },
];

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some((s) => lowerKey.includes(s));
}

export function sanitizeForLogging(input: unknown): unknown {
  if (input === null || input === undefined) {
    return input;
  }

  if (typeof input === 'string') {
    let sanitized = input;
    for (const { regex, replacement } of SECRET_PATTERNS) {
      sanitized = sanitized.replace(regex, replacement);
    }
    return sanitized;
  }

  if (Array.isArray(input)) {
    return input.map(sanitizeForLogging);
  }

  // Errors keep their message and name; pino's err serializer does the rest
  if (input instanceof Error) {
    return input;
  }

  if (typeof input === 'object') {
    return sanitizeContext({ ...input });
  }

  return input;
}

export function sanitizeContext(context: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    sanitized[key] = isSensitiveKey(key) ? '[REDACTED]' : sanitizeForLogging(value);
  }
  return sanitized;
}
